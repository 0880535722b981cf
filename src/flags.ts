import { Flags } from '@oclif/core'

export const tempDirFlag = Flags.string({
  char: 'T',
  description: 'Temporary directory for the downloaded export (default: tmp)',
})

export const extractsDirFlag = Flags.string({
  description: 'Directory the per-country shards are written to (default: extracts)',
})

export const urlFlag = Flags.string({
  description: 'URL of the business card export',
})

export const forceFlag = Flags.boolean({
  char: 'F',
  default: false,
  description: 'Force re-download of the XML file even if it exists',
})

export const verboseFlag = Flags.boolean({
  char: 'V',
  default: false,
  description: 'Print every progress update on its own line',
  exclusive: ['silent'],
})

export const silentFlag = Flags.boolean({
  char: 'S',
  default: false,
  description: 'Suppress all output except errors',
  exclusive: ['verbose'],
})
