// Logging defaults for checkvault-core. CHECKVAULT_LOG_LEVEL overrides the level.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

function parseLevel(raw: string | undefined): LogLevel | undefined {
  return LEVELS.find(level => level === raw?.toLowerCase())
}

const loggingConfig: {
  level: LogLevel
  prefix: string
  files: { [file: string]: boolean }
} = {
  level: parseLevel(process.env.CHECKVAULT_LOG_LEVEL) ?? 'warn',

  // makes vault logs easy to spot
  prefix: '[CheckVault]',

  // per-file overrides for logWithTimestamp
  files: {
    default: true
  }
}

export default loggingConfig
