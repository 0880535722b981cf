import type { Logger } from 'pino'

import { createReadStream, existsSync } from 'node:fs'
import path from 'node:path'

import type { DownloadProgress, DownloadResult, HttpClient } from './download/download.js'
import type { ProgressReporter, SyncPhase, SyncSettings, SyncSummary } from './types.js'

import { downloadExport, EXPORT_FILE_NAME } from './download/download.js'
import { SyncPhaseError } from './errors.js'
import { SENTINEL_COUNTRY } from './extract/record-extractor.js'
import { writeReport } from './report/report.js'
import { splitExport } from './split.js'
import { StatisticsCollector } from './stats/statistics.js'
import { cleanupExtracts, cleanupTemp, ensureDir } from './utils/file-system.js'
import { formatCount, formatDuration, formatMegabytes, formatRate } from './utils/formatting.js'

export const PROGRESS_EVERY_RECORDS = 100_000
export const PROGRESS_INTERVAL_MS = 500

export interface SyncDependencies {
  client?: HttpClient
  logger: Logger
  now?: () => number
  reporter: ProgressReporter
}

export function exportPath(settings: Pick<SyncSettings, 'tempDir'>): string {
  return path.join(settings.tempDir, EXPORT_FILE_NAME)
}

async function inPhase<T>(phase: SyncPhase, work: () => Promise<T> | T): Promise<T> {
  try {
    return await work()
  } catch (error) {
    throw error instanceof SyncPhaseError ? error : new SyncPhaseError(phase, error)
  }
}

/**
 * Downloads the export into the temp directory, reporting progress on a
 * timer rather than per chunk.
 */
export async function downloadPhase(settings: SyncSettings, deps: SyncDependencies): Promise<DownloadResult> {
  const { logger, reporter } = deps
  const now = deps.now ?? Date.now
  const destination = exportPath(settings)

  return inPhase('download', async () => {
    ensureDir(settings.tempDir)

    let latest: DownloadProgress = { receivedBytes: 0, totalBytes: undefined }
    const started = now()
    const showProgress = () => {
      const seconds = (now() - started) / 1000
      const total = latest.totalBytes === undefined ? '' : ` of ${formatMegabytes(latest.totalBytes)} MB`
      reporter.progress(`Downloading ${formatMegabytes(latest.receivedBytes)} MB${total} @ ${seconds.toFixed(1)}s`)
    }

    if (settings.force || !existsSync(destination)) {
      reporter.announce(`Downloading PEPPOL export from ${settings.url}`)
    }

    const timer = setInterval(showProgress, PROGRESS_INTERVAL_MS)
    const result = await downloadExport(
      {
        destination,
        force: settings.force,
        onProgress(progress) {
          latest = progress
        },
        url: settings.url,
      },
      deps.client,
    ).finally(() => clearInterval(timer))

    const durationMs = now() - started
    if (result.reused) {
      reporter.success(`Using existing file ${result.path} (${formatMegabytes(result.sizeBytes)} MB)`)
      logger.info({ path: result.path, sizeBytes: result.sizeBytes }, 'using existing export')
    } else {
      reporter.success(`Downloaded ${path.basename(result.path)} (${formatMegabytes(result.sizeBytes)} MB) in ${formatDuration(durationMs)}`)
      logger.info({ durationMs, path: result.path, sizeBytes: result.sizeBytes, url: settings.url }, 'download finished')
    }

    return result
  })
}

/**
 * Full run: cleanup, download, split, report and optional temp cleanup.
 * Every failure is logged with how far the run got and rethrown wrapped in
 * a {@link SyncPhaseError}.
 */
export async function runSync(settings: SyncSettings, deps: SyncDependencies): Promise<SyncSummary> {
  const { logger, reporter } = deps
  const now = deps.now ?? Date.now
  const statistics = new StatisticsCollector()
  const startedAt = now()
  let phase: SyncPhase = 'setup'
  let downloadMs = 0

  logger.info({ settings }, 'starting sync')

  try {
    await inPhase('setup', () => {
      ensureDir(settings.extractsDir)
    })

    if (settings.cleanupBefore) {
      phase = 'cleanup'
      await inPhase('cleanup', () => {
        reporter.announce('Cleaning up existing extracts')
        const removed = cleanupExtracts(settings.extractsDir)
        reporter.success(`Deleted ${removed} XML files from ${settings.extractsDir}/`)
        logger.info({ removed }, 'cleaned up extracts')
      })
    }

    phase = 'download'
    const downloadStarted = now()
    const download = await downloadPhase(settings, deps)
    downloadMs = now() - downloadStarted

    phase = 'process'
    reporter.announce(`Max bytes per file: ${formatCount(settings.maxBytes)}`)
    reporter.announce(`Processing ${path.basename(download.path)} (${formatMegabytes(download.sizeBytes)} MB)`)
    const processStarted = now()
    const split = await inPhase('process', () =>
      splitExport(createReadStream(download.path), {
        maxBytes: settings.maxBytes,
        onRecord(processed) {
          if (processed % PROGRESS_EVERY_RECORDS === 0) {
            const elapsed = now() - processStarted
            reporter.progress(`${formatCount(processed)} business cards in ${formatDuration(elapsed)}: ${formatRate(processed, elapsed)} cards/sec`)
          }
        },
        outputDir: settings.extractsDir,
        recordElement: settings.recordElement,
        statistics,
      }),
    )
    const processMs = now() - processStarted
    reporter.success(`Processed ${formatCount(split.records)} business cards in ${formatDuration(processMs)}: ${formatRate(split.records, processMs)} cards/sec`)
    const unrouted = statistics.get(SENTINEL_COUNTRY)
    if (unrouted > 0) {
      reporter.warn(`${formatCount(unrouted)} business cards had no usable country code and went to ${SENTINEL_COUNTRY}/`)
      logger.warn({ records: unrouted }, 'records without a country code')
    }

    logger.info(
      { countries: statistics.countries().length, durationMs: processMs, filesCreated: split.filesCreated, records: split.records },
      'processing finished',
    )

    phase = 'report'
    const reportPath = await inPhase('report', () => {
      reporter.announce('Generating report')
      return writeReport(settings.extractsDir, statistics.toRecord(), new Date(now()))
    })
    reporter.success(`Report generated at ${reportPath}`)
    logger.info({ reportPath }, 'report written')

    if (settings.cleanupAfter) {
      phase = 'cleanup'
      await inPhase('cleanup', () => {
        cleanupTemp(settings.tempDir)
        reporter.success(`Cleaned up temporary files in ${settings.tempDir}/`)
      })
    }

    const summary: SyncSummary = {
      countries: statistics.countries().length,
      downloadMs,
      filesCreated: split.filesCreated,
      processMs,
      records: split.records,
      reportPath,
      totalMs: now() - startedAt,
    }
    logger.info({ summary }, 'sync finished')
    return summary
  } catch (error) {
    logger.error(
      { elapsedMs: now() - startedAt, err: error, phase, records: statistics.total },
      'sync failed',
    )
    throw error
  } finally {
    reporter.stop()
  }
}
