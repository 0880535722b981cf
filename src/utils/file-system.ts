import { existsSync, mkdirSync, readdirSync, rmSync, statSync, unlinkSync } from 'node:fs'
import path from 'node:path'

import { toFilesystemError } from '../errors.js'
import { PARTIAL_SUFFIX } from '../output/partition-writer.js'

export interface ShardFile {
  country: string
  path: string
  sizeBytes: number
}

export function ensureDir(directory: string): void {
  try {
    if (!existsSync(directory)) {
      mkdirSync(directory, { recursive: true })
    }
  } catch (error) {
    throw toFilesystemError('create directory', directory, error)
  }
}

/**
 * Lists the country directories directly under `extractsDir`.
 */
export function listCountryDirs(extractsDir: string): string[] {
  if (!existsSync(extractsDir)) return []
  return readdirSync(extractsDir, { withFileTypes: true })
    .filter((dirent) => dirent.isDirectory())
    .map((dirent) => dirent.name)
    .sort()
}

/**
 * Every finished shard (`*.xml`) below the country directories.
 */
export function listShardFiles(extractsDir: string): ShardFile[] {
  const shards: ShardFile[] = []
  for (const country of listCountryDirs(extractsDir)) {
    const countryDir = path.join(extractsDir, country)
    const files = readdirSync(countryDir, { withFileTypes: true })
      .filter((dirent) => dirent.isFile() && dirent.name.endsWith('.xml'))
      .map((dirent) => dirent.name)
      .sort()

    for (const file of files) {
      const filePath = path.join(countryDir, file)
      shards.push({ country, path: filePath, sizeBytes: statSync(filePath).size })
    }
  }

  return shards
}

/**
 * Deletes finished and unfinished shards left by earlier runs. Returns the
 * number of files removed.
 */
export function cleanupExtracts(extractsDir: string): number {
  let removed = 0
  for (const country of listCountryDirs(extractsDir)) {
    const countryDir = path.join(extractsDir, country)
    const files = readdirSync(countryDir, { withFileTypes: true })
      .filter((dirent) => dirent.isFile() && (dirent.name.endsWith('.xml') || dirent.name.endsWith(PARTIAL_SUFFIX)))

    for (const file of files) {
      const filePath = path.join(countryDir, file.name)
      try {
        unlinkSync(filePath)
      } catch (error) {
        throw toFilesystemError('delete', filePath, error)
      }

      removed++
    }
  }

  return removed
}

export function cleanupTemp(tempDir: string): void {
  try {
    rmSync(tempDir, { force: true, recursive: true })
  } catch (error) {
    throw toFilesystemError('delete', tempDir, error)
  }
}

/**
 * The `limit` largest shards, biggest first.
 */
export function findLargestFiles(extractsDir: string, limit: number): ShardFile[] {
  return listShardFiles(extractsDir)
    .sort((a, b) => b.sizeBytes - a.sizeBytes || a.path.localeCompare(b.path))
    .slice(0, limit)
}
