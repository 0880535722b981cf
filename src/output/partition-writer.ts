import { closeSync, mkdirSync, openSync, renameSync, writeSync } from 'node:fs'
import { join } from 'node:path'

import type { BusinessCardRecord, PartitionState, RootDescriptor } from '../types.js'

import { FilesystemError, toFilesystemError } from '../errors.js'
import { renderRecord, renderShardFooter, renderShardHeader } from '../xml/render.js'

export const DEFAULT_MAX_BYTES = 1_000_000
export const DEFAULT_FILE_PREFIX = 'business-cards'
export const PARTIAL_SUFFIX = '.partial'

export interface PartitionWriterOptions {
  filePrefix?: string
  maxBytes?: number
  outputDir: string
  root: RootDescriptor
}

export function shardFileName(prefix: string, sequence: number): string {
  return `${prefix}.${String(sequence).padStart(6, '0')}.xml`
}

/**
 * Writes records into per-country shard files, rotating a country to its next
 * shard once the current one holds more than `maxBytes` of records.
 *
 * A shard is written under a `.partial` name and only renamed to its final
 * name after the root close tag is on disk, so every `.xml` file this writer
 * leaves behind is a complete document.
 */
export class PartitionWriter {
  private created = 0
  private readonly filePrefix: string
  private readonly maxBytes: number
  private readonly open = new Map<string, PartitionState>()
  private readonly outputDir: string
  private readonly root: RootDescriptor
  private readonly sequences = new Map<string, number>()

  constructor(options: PartitionWriterOptions) {
    this.filePrefix = options.filePrefix ?? DEFAULT_FILE_PREFIX
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES
    this.outputDir = options.outputDir
    this.root = options.root
  }

  get filesCreated(): number {
    return this.created
  }

  /**
   * Closes every descriptor without writing footers. The `.partial` files
   * stay on disk for inspection; none of them is renamed into place.
   * Returns the descriptors that failed to close.
   */
  abort(): FilesystemError[] {
    const failures: FilesystemError[] = []
    for (const state of this.open.values()) {
      try {
        closeSync(state.fd)
      } catch (error) {
        failures.push(toFilesystemError('close', state.partialPath, error))
      }
    }

    this.open.clear()
    return failures
  }

  close(): void {
    for (const state of this.open.values()) {
      this.finalize(state)
    }

    this.open.clear()
  }

  write(record: BusinessCardRecord): void {
    let state = this.open.get(record.countryCode)
    if (state && state.bytesWritten > this.maxBytes) {
      this.finalize(state)
      state = undefined
    }

    state ??= this.openShard(record.countryCode)

    const serialized = renderRecord(record)
    this.append(state.fd, serialized, state.partialPath)
    state.bytesWritten += Buffer.byteLength(serialized)
  }

  private append(fd: number, text: string, path: string): void {
    try {
      writeSync(fd, text)
    } catch (error) {
      throw toFilesystemError('write to', path, error)
    }
  }

  private finalize(state: PartitionState): void {
    this.append(state.fd, renderShardFooter(this.root), state.partialPath)
    try {
      closeSync(state.fd)
      renameSync(state.partialPath, state.finalPath)
    } catch (error) {
      throw toFilesystemError('finalize', state.finalPath, error)
    } finally {
      this.open.delete(state.countryCode)
    }
  }

  private openShard(countryCode: string): PartitionState {
    const directory = join(this.outputDir, countryCode)
    try {
      mkdirSync(directory, { recursive: true })
    } catch (error) {
      throw toFilesystemError('create directory', directory, error)
    }

    const sequence = (this.sequences.get(countryCode) ?? 0) + 1
    this.sequences.set(countryCode, sequence)

    const finalPath = join(directory, shardFileName(this.filePrefix, sequence))
    const partialPath = `${finalPath}${PARTIAL_SUFFIX}`
    let fd: number
    try {
      fd = openSync(partialPath, 'w')
    } catch (error) {
      throw toFilesystemError('create', partialPath, error)
    }

    const state: PartitionState = { bytesWritten: 0, countryCode, fd, finalPath, partialPath }
    this.open.set(countryCode, state)
    this.append(fd, renderShardHeader(this.root), partialPath)
    this.created++
    return state
  }
}
