import { Command } from '@oclif/core'

import { getConfigPath, getLastSync, readStoredDefaults, resolveSettings } from '../../utils/config.js'
import { formatCount } from '../../utils/formatting.js'

export default class Check extends Command {
  static description = 'Show the settings a sync would run with'

  async run(): Promise<void> {
    await this.parse(Check)
    const settings = resolveSettings({}, readStoredDefaults())

    this.log('✅ Configuration OK')
    this.log(`   Temp directory: ${settings.tempDir}`)
    this.log(`   Extracts directory: ${settings.extractsDir}`)
    this.log(`   Export URL: ${settings.url}`)
    this.log(`   Record element: ${settings.recordElement}`)
    this.log(`   Max bytes per file: ${formatCount(settings.maxBytes)}`)
    this.log(`   Config file: ${getConfigPath()}`)

    const lastSync = getLastSync()
    if (lastSync) {
      this.log(`   Last sync: ${lastSync.finishedAt} (${formatCount(lastSync.records)} business cards, ${lastSync.filesCreated} files)`)
    }
  }
}
