import type { Config } from '@root/types/config.types.js'
import type {
  DuplicateField,
  QueuePolicy,
} from '@root/types/notification.types.js'
import type { FastifyBaseLogger } from 'fastify'

export const DUPLICATE_FIELDS: readonly DuplicateField[] = [
  'appName',
  'summary',
  'body',
  'icon',
  'category',
  'urgency',
]

export const DEFAULT_DUPLICATE_FIELDS = 'appName,summary,body,icon,urgency'

const KNOWN_FIELDS = new Set<string>(DUPLICATE_FIELDS)

function isDuplicateField(value: string): value is DuplicateField {
  return KNOWN_FIELDS.has(value)
}

/**
 * Parses the comma separated duplicate field list, dropping unknown names.
 */
export function parseDuplicateFields(
  raw: string,
  log?: FastifyBaseLogger,
): DuplicateField[] {
  const fields: DuplicateField[] = []

  for (const name of raw.split(',').map((part) => part.trim())) {
    if (name === '') continue
    if (!isDuplicateField(name)) {
      log?.warn(
        { field: name, allowed: DUPLICATE_FIELDS },
        'Ignoring unknown duplicate field',
      )
      continue
    }
    if (!fields.includes(name)) {
      fields.push(name)
    }
  }

  return fields
}

/**
 * Builds the queue engine's policy from the loaded configuration.
 */
export function parseQueuePolicy(
  config: Config,
  log?: FastifyBaseLogger,
): QueuePolicy {
  const duplicateFields = parseDuplicateFields(config.duplicateFields, log)

  if (config.stackDuplicates && duplicateFields.length === 0) {
    log?.warn(
      'Duplicate stacking is enabled but no duplicate fields are configured, only stack tags will match',
    )
  }

  return {
    displayLimit: Math.max(0, config.displayLimit),
    historyLength: Math.max(0, config.historyLength),
    stickyHistory: config.stickyHistory,
    stackDuplicates: config.stackDuplicates,
    duplicateFields,
    defaultTimeouts: {
      low: Math.max(0, config.timeoutLow),
      normal: Math.max(0, config.timeoutNormal),
      critical: Math.max(0, config.timeoutCritical),
    },
    fullscreenOverride: config.fullscreenOverride,
    fullscreenTimeout: Math.max(0, config.fullscreenTimeout),
    showAgeThreshold:
      config.showAgeThreshold < 0 ? -1 : config.showAgeThreshold,
  }
}
