import { writeFileSync } from 'node:fs'
import path from 'node:path'

import type { DiskUsage, ReportRow } from '../types.js'

import { toFilesystemError } from '../errors.js'
import { listShardFiles } from '../utils/file-system.js'
import { formatMegabytes, formatTimestamp } from '../utils/formatting.js'

export const REPORT_FILE = 'report.md'

/**
 * Files and bytes on disk per country directory.
 */
export function scanPartitions(extractsDir: string): Map<string, DiskUsage> {
  const usage = new Map<string, DiskUsage>()
  for (const shard of listShardFiles(extractsDir)) {
    const entry = usage.get(shard.country) ?? { files: 0, sizeBytes: 0 }
    entry.files++
    entry.sizeBytes += shard.sizeBytes
    usage.set(shard.country, entry)
  }

  return usage
}

/**
 * Joins the counted records with what is on disk. A country that only one
 * side knows about still gets a row, with zeros for the other side.
 */
export function buildReportRows(counts: Record<string, number>, disk: Map<string, DiskUsage>): ReportRow[] {
  const countries = new Set([...Object.keys(counts), ...disk.keys()])
  return [...countries].sort().map((country) => ({
    country,
    files: disk.get(country)?.files ?? 0,
    records: counts[country] ?? 0,
    sizeBytes: disk.get(country)?.sizeBytes ?? 0,
  }))
}

export function renderReport(rows: ReportRow[], generatedAt: Date): string {
  let output = '# PEPPOL Sync Report\n\n'
  output += `Generated on: ${formatTimestamp(generatedAt)}\n\n`
  output += '| Country | Files | Records | Size (MB) |\n'
  output += '|---|---:|---:|---:|\n'

  let totalFiles = 0
  let totalRecords = 0
  let totalBytes = 0
  for (const row of rows) {
    output += `| ${row.country} | ${row.files} | ${row.records} | ${formatMegabytes(row.sizeBytes)} |\n`
    totalFiles += row.files
    totalRecords += row.records
    totalBytes += row.sizeBytes
  }

  output += `| **Total** | **${totalFiles}** | **${totalRecords}** | **${formatMegabytes(totalBytes)}** |\n`
  return output
}

/**
 * Writes `report.md` into the extracts directory and returns its path.
 */
export function writeReport(extractsDir: string, counts: Record<string, number>, generatedAt: Date = new Date()): string {
  const rows = buildReportRows(counts, scanPartitions(extractsDir))
  const reportPath = path.join(extractsDir, REPORT_FILE)
  try {
    writeFileSync(reportPath, renderReport(rows, generatedAt))
  } catch (error) {
    throw toFilesystemError('write', reportPath, error)
  }

  return reportPath
}
