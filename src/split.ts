import type { RootDescriptor } from './types.js'

import { extractRecords } from './extract/record-extractor.js'
import { PartitionWriter } from './output/partition-writer.js'
import { StatisticsCollector } from './stats/statistics.js'
import { tokenize } from './xml/tokenizer.js'

export interface SplitOptions {
  filePrefix?: string
  maxBytes?: number
  onRecord?: (processed: number) => void
  outputDir: string
  recordElement?: string
  statistics?: StatisticsCollector
}

export interface SplitResult {
  filesCreated: number
  records: number
  root: RootDescriptor | undefined
  statistics: StatisticsCollector
}

/**
 * Streams an XML export into per-country shards. Any failure aborts the
 * writer, leaving only `.partial` files for the shards that were open.
 */
export async function splitExport(source: AsyncIterable<string | Uint8Array>, options: SplitOptions): Promise<SplitResult> {
  const statistics = options.statistics ?? new StatisticsCollector()
  // filled in by onRoot once the root start tag has been read
  const output: { root?: RootDescriptor; writer?: PartitionWriter } = {}
  let records = 0

  const onRoot = (descriptor: RootDescriptor) => {
    output.root = descriptor
    output.writer = new PartitionWriter({
      filePrefix: options.filePrefix,
      maxBytes: options.maxBytes,
      outputDir: options.outputDir,
      root: descriptor,
    })
  }

  try {
    for await (const record of extractRecords(tokenize(source), {
      onRoot,
      recordElement: options.recordElement,
      statistics,
    })) {
      output.writer?.write(record)
      records++
      options.onRecord?.(records)
    }

    output.writer?.close()
  } catch (error) {
    const failures = output.writer?.abort() ?? []
    if (failures.length > 0) {
      throw new AggregateError([error, ...failures], 'Split failed and open shards could not be closed')
    }

    throw error
  }

  return { filesCreated: output.writer?.filesCreated ?? 0, records, root: output.root, statistics }
}
