import type { Ora } from 'ora'

import ora from 'ora'

import type { ProgressReporter } from '../types.js'

export interface ReporterOptions {
  log: (message: string) => void
  silent?: boolean
  verbose?: boolean
}

/**
 * Console progress for the CLI. Progress updates go to a spinner, or to
 * plain lines with `verbose`; `silent` drops everything.
 */
export function createCliReporter(options: ReporterOptions): ProgressReporter {
  const { log } = options
  let spinner: Ora | undefined

  const stopSpinner = () => {
    spinner?.stop()
    spinner = undefined
  }

  if (options.silent) {
    return {
      announce() {},
      progress() {},
      stop() {},
      success() {},
      warn() {},
    }
  }

  return {
    announce(message) {
      stopSpinner()
      log(`⏳  ${message}`)
    },
    progress(message) {
      if (options.verbose) {
        log(`... ${message}`)
        return
      }

      if (spinner) {
        spinner.text = message
      } else {
        spinner = ora(message).start()
      }
    },
    stop: stopSpinner,
    success(message) {
      stopSpinner()
      log(`✅  ${message}`)
    },
    warn(message) {
      stopSpinner()
      log(`⚠️  ${message}`)
    },
  }
}
