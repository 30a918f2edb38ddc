import { Db, MongoClient } from 'mongodb'
import { IntervalHeightClock } from '@gridmint/core'
import type { HeightClock, ProducerRegistry, ProofStore, ServiceDirectory, SettlementRail } from '@gridmint/core'
import { LedgerService, LedgerServiceOptions } from './LedgerService.js'
import { LedgerStorageManager } from './storage/LedgerStorageManager.js'
import { LedgerEnv, loadLedgerEnv } from './config.js'

/**
 * Services a ledger reaches at run time, which the environment cannot name
 */
export interface LedgerPorts {
  proofStores: ServiceDirectory<ProofStore>
  registries: ServiceDirectory<ProducerRegistry>
  settlement: SettlementRail
  /** Defaults to a clock derived from GENESIS_TIME and BLOCK_INTERVAL_MS; one of the two is required */
  clock?: HeightClock
}

/**
 * Connect to MongoDB and open the ledger the environment describes.
 * The caller closes the returned client.
 */
export const openFromEnvironment = async (
  ports: LedgerPorts,
  env: LedgerEnv = loadLedgerEnv()
): Promise<{ service: LedgerService, client: MongoClient }> => {
  const clock = ports.clock ?? (env.genesisTime !== undefined
    ? new IntervalHeightClock(env.genesisTime, env.blockIntervalMs)
    : undefined)
  if (clock === undefined) {
    throw new Error('GENESIS_TIME is required when no clock is supplied')
  }

  const client = new MongoClient(env.mongoUrl)
  await client.connect()
  try {
    const service = await createLedgerService(client.db(env.mongoDb), {
      ledgerId: env.ledgerId,
      minterConfig: {
        owner: env.owner,
        attester: env.attester,
        registry: env.registry,
        feeRecipient: env.feeRecipient,
        proofStores: ports.proofStores,
        registries: ports.registries,
        settlement: ports.settlement,
        clock,
        historyCapacity: env.historyCapacity,
        historyOverflow: env.historyOverflow
      }
    })
    return { service, client }
  } catch (error) {
    await client.close()
    throw error
  }
}

// Factory function
const createLedgerService = async (db: Db, options: LedgerServiceOptions): Promise<LedgerService> => {
  return await LedgerService.open(new LedgerStorageManager(db), options)
}

export default createLedgerService
export { LedgerService }
