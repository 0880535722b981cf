import { Command } from '@oclif/core'

import { forceFlag, silentFlag, tempDirFlag, urlFlag, verboseFlag } from '../../flags.js'
import { downloadPhase } from '../../sync.js'
import { readStoredDefaults, resolveSettings } from '../../utils/config.js'
import { formatMegabytes } from '../../utils/formatting.js'
import { createSilentLogger } from '../../utils/logger.js'
import { createCliReporter } from '../../utils/reporter.js'

export default class Download extends Command {
  static description = 'Download the business card export without processing it'
  static examples = [
    `<%= config.bin %> <%= command.id %> --force
Download a fresh copy into the temporary directory
`,
  ]
  static flags = {
    force: forceFlag,
    silent: silentFlag,
    'temp-dir': tempDirFlag,
    url: urlFlag,
    verbose: verboseFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Download)
    const settings = resolveSettings(
      { force: flags.force, silent: flags.silent, tempDir: flags['temp-dir'], url: flags.url, verbose: flags.verbose },
      readStoredDefaults(),
    )
    const reporter = createCliReporter({ log: (message) => this.log(message), ...settings })

    try {
      const result = await downloadPhase(settings, { logger: createSilentLogger(), reporter })
      if (!settings.silent) {
        this.log('\n📁 Downloaded file:')
        this.log(`   Location: ${result.path}`)
        this.log(`   Size: ${formatMegabytes(result.sizeBytes)} MB`)
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.error(`❌ Download failed: ${message}`, { exit: 1 })
    } finally {
      reporter.stop()
    }
  }
}
