export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  port: number
  host: string
  logLevel: LogLevel
  closeGraceDelay: number

  // Queue Config
  displayLimit: number
  historyLength: number
  stickyHistory: boolean
  stackDuplicates: boolean
  /** Comma separated list of record fields compared by the duplicate check */
  duplicateFields: string

  // Timeout Config (milliseconds)
  timeoutLow: number
  timeoutNormal: number
  timeoutCritical: number
  fullscreenOverride: boolean
  fullscreenTimeout: number
  showAgeThreshold: number

  // Driver Config
  driverFallbackInterval: number
}
