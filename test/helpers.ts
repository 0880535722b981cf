import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import type { ProgressReporter, XmlEvent } from '../src/types.js'

import { XmlTokenizer } from '../src/xml/tokenizer.js'

export function makeTempDir(): { path: string; remove(): void } {
  const path = mkdtempSync(join(tmpdir(), 'peppol-sync-test-'))
  return {
    path,
    remove: () => rmSync(path, { force: true, recursive: true }),
  }
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = []
  for await (const item of source) items.push(item)
  return items
}

/**
 * Feeds `xml` to a fresh tokenizer `chunkSize` characters at a time.
 */
export function tokenizeInChunks(xml: string, chunkSize = xml.length || 1): XmlEvent[] {
  const tokenizer = new XmlTokenizer()
  const events: XmlEvent[] = []
  for (let i = 0; i < xml.length; i += chunkSize) {
    events.push(...tokenizer.write(xml.slice(i, i + chunkSize)))
  }

  events.push(...tokenizer.end())
  return events
}

/**
 * Splits a string into byte chunks of `size`, cutting through multi-byte
 * characters where the boundary falls.
 */
export function byteChunks(text: string, size: number): Buffer[] {
  const bytes = Buffer.from(text)
  const chunks: Buffer[] = []
  for (let i = 0; i < bytes.length; i += size) {
    chunks.push(bytes.subarray(i, i + size))
  }

  return chunks
}

export interface RecordingReporter extends ProgressReporter {
  messages: string[]
}

export function recordingReporter(): RecordingReporter {
  const messages: string[] = []
  return {
    announce: (message) => messages.push(`announce: ${message}`),
    messages,
    progress: (message) => messages.push(`progress: ${message}`),
    stop() {},
    success: (message) => messages.push(`success: ${message}`),
    warn: (message) => messages.push(`warn: ${message}`),
  }
}
