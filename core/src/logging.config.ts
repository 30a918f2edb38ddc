// Default logging state for all files
const defaultLogging = true

// Specific file logging overrides
const loggingConfig: { [file: string]: boolean } = {
  default: defaultLogging,
  // mint/burn/transfer flow
  Minter: true,
  // persistence and queueing in the backend
  LedgerService: true
}

export default loggingConfig
