import { Command, Flags } from '@oclif/core'

import { extractsDirFlag } from '../../flags.js'
import { readStoredDefaults, resolveSettings } from '../../utils/config.js'
import { findLargestFiles } from '../../utils/file-system.js'
import { formatMegabytes } from '../../utils/formatting.js'

export default class Huge extends Command {
  static description = 'List the largest XML shards in the extracts directory'
  static flags = {
    'extracts-dir': extractsDirFlag,
    number: Flags.integer({
      char: 'n',
      default: 10,
      description: 'How many files to show',
      min: 1,
    }),
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Huge)
    const settings = resolveSettings({ extractsDir: flags['extracts-dir'] }, readStoredDefaults())

    this.log(`⏳  Finding the ${flags.number} largest XML files under ${settings.extractsDir}/`)
    const files = findLargestFiles(settings.extractsDir, flags.number)
    if (files.length === 0) {
      this.log('No XML files found.')
      return
    }

    for (const file of files) {
      this.log(`${formatMegabytes(file.sizeBytes).padStart(10)} MB  ${file.path}`)
    }
  }
}
