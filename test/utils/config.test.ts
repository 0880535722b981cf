import { expect } from 'chai'

import type { StoredDefaults } from '../../src/utils/config.js'

import { ConfigurationError } from '../../src/errors.js'
import {
  BUILT_IN_DEFAULTS,
  clearAllDefaults,
  clearDefault,
  createConfigStore,
  getLastSync,
  parseAssignment,
  parseMaxBytes,
  readStoredDefaults,
  recordLastSync,
  resolveSettings,
  saveDefault,
} from '../../src/utils/config.js'
import { makeTempDir } from '../helpers.js'

const NOTHING_STORED: StoredDefaults = { extractsDir: null, maxBytes: null, recordElement: null, tempDir: null, url: null }

describe('config', () => {
  describe('resolveSettings', () => {
    it('falls back to built-in defaults', () => {
      expect(resolveSettings({}, NOTHING_STORED)).to.deep.equal({
        cleanupAfter: false,
        cleanupBefore: true,
        extractsDir: 'extracts',
        force: false,
        maxBytes: 1_000_000,
        recordElement: 'businesscard',
        silent: false,
        tempDir: 'tmp',
        url: BUILT_IN_DEFAULTS.url,
        verbose: false,
      })
    })

    it('prefers flags over stored defaults over built-in defaults', () => {
      const stored = { ...NOTHING_STORED, extractsDir: 'stored-extracts', maxBytes: 5000, tempDir: 'stored-tmp' }
      const settings = resolveSettings({ maxBytes: 200, tempDir: 'flag-tmp' }, stored)

      expect(settings.maxBytes).to.equal(200)
      expect(settings.tempDir).to.equal('flag-tmp')
      expect(settings.extractsDir).to.equal('stored-extracts')
      expect(settings.recordElement).to.equal('businesscard')
    })

    it('rejects a record element that is not an XML name', () => {
      expect(() => resolveSettings({ recordElement: '1card' }, NOTHING_STORED)).to.throw(
        ConfigurationError,
        'Invalid record element name "1card"',
      )
    })
  })

  describe('parseMaxBytes', () => {
    it('accepts positive integers given as text', () => {
      expect(parseMaxBytes('2000000')).to.equal(2_000_000)
    })

    for (const raw of ['0', '-5', '1.5', 'lots']) {
      it(`rejects "${raw}"`, () => {
        expect(() => parseMaxBytes(raw)).to.throw(ConfigurationError, `max-bytes must be a positive integer, got "${raw}"`)
      })
    }
  })

  describe('parseAssignment', () => {
    it('maps kebab-case names to stored keys', () => {
      expect(parseAssignment('max-bytes = 2000')).to.deep.equal({ key: 'maxBytes', value: '2000' })
      expect(parseAssignment('url=https://example.test/a=b')).to.deep.equal({ key: 'url', value: 'https://example.test/a=b' })
    })

    it('rejects unknown names and missing values', () => {
      expect(() => parseAssignment('colour=red')).to.throw(ConfigurationError, /Unknown setting "colour"/)
      expect(() => parseAssignment('max-bytes')).to.throw(ConfigurationError, 'Expected key=value, got "max-bytes"')
    })
  })

  describe('stored defaults', () => {
    let temp: ReturnType<typeof makeTempDir>

    beforeEach(() => {
      temp = makeTempDir()
    })

    afterEach(() => {
      temp.remove()
    })

    it('saves, reads and clears defaults', () => {
      const store = createConfigStore(temp.path)
      saveDefault('maxBytes', '4096', store)
      saveDefault('url', 'https://example.test/export', store)

      expect(readStoredDefaults(store)).to.deep.equal({
        ...NOTHING_STORED,
        maxBytes: 4096,
        url: 'https://example.test/export',
      })

      clearDefault('url', store)
      expect(readStoredDefaults(store).url).to.equal(null)

      clearAllDefaults(store)
      expect(readStoredDefaults(store)).to.deep.equal(NOTHING_STORED)
    })

    it('refuses to store an invalid max-bytes', () => {
      const store = createConfigStore(temp.path)
      expect(() => saveDefault('maxBytes', '0', store)).to.throw(ConfigurationError)
      expect(readStoredDefaults(store).maxBytes).to.equal(null)
    })

    it('remembers the last sync', () => {
      const store = createConfigStore(temp.path)
      const summary = { countries: 2, downloadMs: 10, filesCreated: 3, processMs: 20, records: 40, reportPath: 'extracts/report.md', totalMs: 35 }
      recordLastSync(summary, new Date('2024-05-01T10:00:00Z'), store)

      expect(getLastSync(store)).to.deep.equal({ ...summary, finishedAt: '2024-05-01T10:00:00.000Z' })
    })
  })
})
