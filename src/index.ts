export { run } from '@oclif/core'

export { extractRecords, deriveCountryCode, normalizeCountryCode, SENTINEL_COUNTRY } from './extract/record-extractor.js'
export { PartitionWriter, shardFileName } from './output/partition-writer.js'
export { buildReportRows, renderReport, scanPartitions, writeReport } from './report/report.js'
export { splitExport } from './split.js'
export { StatisticsCollector } from './stats/statistics.js'
export { runSync } from './sync.js'
export type * from './types.js'
export { tokenize, XmlTokenizer } from './xml/tokenizer.js'
