import dotenv from 'dotenv'
import { DEFAULT_BLOCK_INTERVAL_MS, MINT_HISTORY_CAPACITY } from '@gridmint/core'
import type { HistoryOverflowPolicy } from '@gridmint/core'

dotenv.config()

/**
 * Settings read from the environment
 */
export interface LedgerEnv {
  mongoUrl: string
  mongoDb: string
  ledgerId: string
  owner: string
  attester: string
  registry: string
  feeRecipient?: string
  historyCapacity: number
  historyOverflow: HistoryOverflowPolicy
  /**
   * Epoch milliseconds of height 0. Unset unless GENESIS_TIME is given;
   * a ledger opened without a clock port requires it.
   */
  genesisTime?: number
  blockIntervalMs: number
}

type Env = Record<string, string | undefined>

const required = (env: Env, name: string): string => {
  const value = env[name]?.trim()
  if (value === undefined || value === '') {
    throw new Error(`Missing required environment variable ${name}`)
  }
  return value
}

const optional = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim()
  return value === undefined || value === '' ? undefined : value
}

const optionalInteger = (env: Env, name: string, min: number): number | undefined => {
  const raw = optional(env, name)
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isSafeInteger(value) || value < min) {
    throw new Error(`${name} must be an integer of at least ${min}, got "${raw}"`)
  }
  return value
}

const integer = (env: Env, name: string, fallback: number, min: number): number =>
  optionalInteger(env, name, min) ?? fallback

const overflowPolicy = (env: Env): HistoryOverflowPolicy => {
  const raw = optional(env, 'MINT_HISTORY_OVERFLOW') ?? 'reject'
  if (raw === 'reject' || raw === 'drop-oldest') return raw
  throw new Error(`MINT_HISTORY_OVERFLOW must be "reject" or "drop-oldest", got "${raw}"`)
}

/**
 * Read ledger settings from `env`.
 *
 * LEDGER_OWNER, LEDGER_ATTESTER and LEDGER_REGISTRY are required.
 */
export const loadLedgerEnv = (env: Env = process.env): LedgerEnv => ({
  mongoUrl: optional(env, 'MONGO_URL') ?? 'mongodb://localhost:27017',
  mongoDb: optional(env, 'MONGO_DB') ?? 'gridmint',
  ledgerId: optional(env, 'LEDGER_ID') ?? 'default',
  owner: required(env, 'LEDGER_OWNER'),
  attester: required(env, 'LEDGER_ATTESTER'),
  registry: required(env, 'LEDGER_REGISTRY'),
  feeRecipient: optional(env, 'LEDGER_FEE_RECIPIENT'),
  historyCapacity: integer(env, 'MINT_HISTORY_CAPACITY', MINT_HISTORY_CAPACITY, 1),
  historyOverflow: overflowPolicy(env),
  genesisTime: optionalInteger(env, 'GENESIS_TIME', 0),
  blockIntervalMs: integer(env, 'BLOCK_INTERVAL_MS', DEFAULT_BLOCK_INTERVAL_MS, 1)
})
