import { Command, Flags } from '@oclif/core'

import {
  clearAllDefaults,
  clearDefault,
  CONFIG_KEYS,
  getConfigPath,
  parseAssignment,
  readStoredDefaults,
  resolveKey,
  saveDefault,
} from '../../utils/config.js'

export default class Config extends Command {
  static description = 'Show or change the stored defaults used by sync'
  static examples = [
    `<%= config.bin %> <%= command.id %> --set max-bytes=2000000
Use 2 MB shards unless --max-bytes is given
`,
    `<%= config.bin %> <%= command.id %> --unset max-bytes
Go back to the built-in default
`,
  ]
  static flags = {
    reset: Flags.boolean({
      description: 'Remove every stored default',
      exclusive: ['set', 'unset'],
    }),
    set: Flags.string({
      description: `Store a default as key=value (keys: ${Object.keys(CONFIG_KEYS).join(', ')})`,
      multiple: true,
    }),
    unset: Flags.string({
      description: 'Remove a stored default',
      multiple: true,
    }),
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Config)

    try {
      if (flags.reset) {
        clearAllDefaults()
        this.log('Stored defaults cleared.')
      }

      for (const name of flags.unset ?? []) {
        clearDefault(resolveKey(name))
      }

      for (const assignment of flags.set ?? []) {
        const { key, value } = parseAssignment(assignment)
        saveDefault(key, value)
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.error(message, { exit: 1 })
    }

    const stored = readStoredDefaults()
    this.log(`Config file: ${getConfigPath()}`)
    for (const [name, key] of Object.entries(CONFIG_KEYS)) {
      this.log(`   ${name}: ${stored[key] ?? '(default)'}`)
    }
  }
}
