import { Command, Flags } from '@oclif/core'
import path from 'node:path'

import type { SyncSettings } from '../../types.js'

import { extractsDirFlag, forceFlag, silentFlag, tempDirFlag, urlFlag, verboseFlag } from '../../flags.js'
import { runSync } from '../../sync.js'
import { readStoredDefaults, recordLastSync, resolveSettings } from '../../utils/config.js'
import { ensureDir } from '../../utils/file-system.js'
import { formatCount } from '../../utils/formatting.js'
import { createRunLogger, LOG_FILE } from '../../utils/logger.js'
import { createCliReporter } from '../../utils/reporter.js'

interface SyncFlags {
  'cleanup-after': boolean
  'cleanup-before': boolean
  'extracts-dir'?: string
  force: boolean
  'max-bytes'?: number
  'record-element'?: string
  silent: boolean
  'temp-dir'?: string
  url?: string
  verbose: boolean
}

export function settingsFromFlags(flags: SyncFlags): Partial<SyncSettings> {
  return {
    cleanupAfter: flags['cleanup-after'],
    cleanupBefore: flags['cleanup-before'],
    extractsDir: flags['extracts-dir'],
    force: flags.force,
    maxBytes: flags['max-bytes'],
    recordElement: flags['record-element'],
    silent: flags.silent,
    tempDir: flags['temp-dir'],
    url: flags.url,
    verbose: flags.verbose,
  }
}

export default class Sync extends Command {
  static description = 'Download the business card export and split it into per-country XML shards'
  static examples = [
    `<%= config.bin %> <%= command.id %>
Download (if needed), split into extracts/{COUNTRY}/ and write extracts/report.md
`,
    `<%= config.bin %> <%= command.id %> --max-bytes 2000000 --no-cleanup-before
Use 2 MB shards and keep shards from earlier runs
`,
  ]
  static flags = {
    'cleanup-after': Flags.boolean({
      char: 'A',
      default: false,
      description: 'Delete the temporary directory after processing',
    }),
    'cleanup-before': Flags.boolean({
      allowNo: true,
      char: 'C',
      default: true,
      description: 'Delete existing XML shards in the extracts directory before starting',
    }),
    'extracts-dir': extractsDirFlag,
    force: forceFlag,
    'max-bytes': Flags.integer({
      char: 'B',
      description: 'Maximum number of record bytes per output file (default: 1000000)',
      min: 1,
    }),
    'record-element': Flags.string({
      description: 'Name of the record element to split on (default: businesscard)',
    }),
    silent: silentFlag,
    'temp-dir': tempDirFlag,
    url: urlFlag,
    verbose: verboseFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Sync)
    const settings = resolveSettings(settingsFromFlags(flags), readStoredDefaults())

    ensureDir(settings.extractsDir)
    const logger = createRunLogger(path.join(settings.extractsDir, LOG_FILE))
    const reporter = createCliReporter({ log: (message) => this.log(message), ...settings })

    try {
      const summary = await runSync(settings, { logger, reporter })
      recordLastSync(summary, new Date())

      if (!settings.silent) {
        this.log('\n📊 Summary:')
        this.log(`   Total business cards: ${formatCount(summary.records)}`)
        this.log(`   Countries found: ${summary.countries}`)
        this.log(`   Output files created: ${summary.filesCreated}`)
        this.log(`   Output directory: ${settings.extractsDir}/`)
        this.log('\n✅  Sync complete!')
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.error(`❌ ${message}`, { exit: 1 })
    } finally {
      logger.flush()
    }
  }
}
