import Conf from 'conf'

import type { SyncSettings, SyncSummary } from '../types.js'

import { DEFAULT_EXPORT_URL } from '../download/download.js'
import { ConfigurationError } from '../errors.js'
import { DEFAULT_RECORD_ELEMENT } from '../extract/record-extractor.js'
import { DEFAULT_MAX_BYTES } from '../output/partition-writer.js'

export interface StoredDefaults {
  extractsDir: null | string
  maxBytes: null | number
  recordElement: null | string
  tempDir: null | string
  url: null | string
}

interface ConfigSchema extends StoredDefaults {
  lastSync: null | (SyncSummary & { finishedAt: string })
}

export type DefaultKey = keyof StoredDefaults

export const CONFIG_KEYS: Record<string, DefaultKey> = {
  'extracts-dir': 'extractsDir',
  'max-bytes': 'maxBytes',
  'record-element': 'recordElement',
  'temp-dir': 'tempDir',
  url: 'url',
}

export const BUILT_IN_DEFAULTS = {
  extractsDir: 'extracts',
  maxBytes: DEFAULT_MAX_BYTES,
  recordElement: DEFAULT_RECORD_ELEMENT,
  tempDir: 'tmp',
  url: DEFAULT_EXPORT_URL,
}

let store: Conf<ConfigSchema> | undefined

export function createConfigStore(cwd?: string): Conf<ConfigSchema> {
  return new Conf<ConfigSchema>({
    cwd,
    projectName: 'peppol-sync',
    schema: {
      extractsDir: { default: null, type: ['string', 'null'] },
      lastSync: { default: null, type: ['object', 'null'] },
      maxBytes: { default: null, minimum: 1, type: ['integer', 'null'] },
      recordElement: { default: null, type: ['string', 'null'] },
      tempDir: { default: null, type: ['string', 'null'] },
      url: { default: null, type: ['string', 'null'] },
    },
  })
}

function getStore(): Conf<ConfigSchema> {
  store ??= createConfigStore()
  return store
}

export function getConfigPath(): string {
  return getStore().path
}

export function readStoredDefaults(config: Conf<ConfigSchema> = getStore()): StoredDefaults {
  return {
    extractsDir: config.get('extractsDir'),
    maxBytes: config.get('maxBytes'),
    recordElement: config.get('recordElement'),
    tempDir: config.get('tempDir'),
    url: config.get('url'),
  }
}

export function saveDefault(key: DefaultKey, raw: string, config: Conf<ConfigSchema> = getStore()): void {
  if (key === 'maxBytes') {
    config.set('maxBytes', parseMaxBytes(raw))
  } else {
    config.set(key, raw)
  }
}

export function clearDefault(key: DefaultKey, config: Conf<ConfigSchema> = getStore()): void {
  config.set(key, null)
}

export function clearAllDefaults(config: Conf<ConfigSchema> = getStore()): void {
  config.clear()
}

export function recordLastSync(summary: SyncSummary, finishedAt: Date, config: Conf<ConfigSchema> = getStore()): void {
  config.set('lastSync', { ...summary, finishedAt: finishedAt.toISOString() })
}

export function getLastSync(config: Conf<ConfigSchema> = getStore()): ConfigSchema['lastSync'] {
  return config.get('lastSync')
}

/**
 * Parses `key=value` as given to `config --set`.
 */
export function parseAssignment(assignment: string): { key: DefaultKey; value: string } {
  const separator = assignment.indexOf('=')
  if (separator === -1) {
    throw new ConfigurationError(`Expected key=value, got "${assignment}"`)
  }

  const key = resolveKey(assignment.slice(0, separator).trim())
  return { key, value: assignment.slice(separator + 1).trim() }
}

export function resolveKey(name: string): DefaultKey {
  const key = CONFIG_KEYS[name]
  if (!key) {
    throw new ConfigurationError(`Unknown setting "${name}". Known settings: ${Object.keys(CONFIG_KEYS).join(', ')}`)
  }

  return key
}

export function parseMaxBytes(raw: number | string): number {
  const value = typeof raw === 'number' ? raw : Number(raw)
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`max-bytes must be a positive integer, got "${raw}"`, { maxBytes: raw })
  }

  return value
}

/**
 * Merges command flags over stored defaults over built-in defaults.
 */
export function resolveSettings(flags: Partial<SyncSettings>, stored: StoredDefaults): SyncSettings {
  const recordElement = flags.recordElement ?? stored.recordElement ?? BUILT_IN_DEFAULTS.recordElement
  if (!/^[\p{L}_][\p{L}\p{N}_.-]*$/u.test(recordElement)) {
    throw new ConfigurationError(`Invalid record element name "${recordElement}"`, { recordElement })
  }

  return {
    cleanupAfter: flags.cleanupAfter ?? false,
    cleanupBefore: flags.cleanupBefore ?? true,
    extractsDir: flags.extractsDir ?? stored.extractsDir ?? BUILT_IN_DEFAULTS.extractsDir,
    force: flags.force ?? false,
    maxBytes: parseMaxBytes(flags.maxBytes ?? stored.maxBytes ?? BUILT_IN_DEFAULTS.maxBytes),
    recordElement,
    silent: flags.silent ?? false,
    tempDir: flags.tempDir ?? stored.tempDir ?? BUILT_IN_DEFAULTS.tempDir,
    url: flags.url ?? stored.url ?? BUILT_IN_DEFAULTS.url,
    verbose: flags.verbose ?? false,
  }
}
