export interface XmlAttribute {
  name: string
  value: string
}

export interface StartTagEvent {
  attributes: XmlAttribute[]
  kind: 'start'
  name: string
  raw: string
  selfClosing: boolean
}

export interface EndTagEvent {
  kind: 'end'
  name: string
  raw: string
}

export interface RawEvent {
  kind: 'cdata' | 'comment' | 'doctype' | 'instruction' | 'text'
  raw: string
}

export type XmlEvent = EndTagEvent | RawEvent | StartTagEvent

/**
 * The outermost element of the source document. Every shard reuses it as its
 * own root so each file parses on its own.
 */
export interface RootDescriptor {
  attributes: XmlAttribute[]
  name: string
}

export interface BusinessCardRecord {
  attributes: XmlAttribute[]
  countryCode: string
  elementName: string
  innerContent: string
}

export interface PartitionState {
  bytesWritten: number
  countryCode: string
  fd: number
  finalPath: string
  partialPath: string
}

export interface ReportRow {
  country: string
  files: number
  records: number
  sizeBytes: number
}

export interface DiskUsage {
  files: number
  sizeBytes: number
}

export interface SyncSettings {
  cleanupAfter: boolean
  cleanupBefore: boolean
  extractsDir: string
  force: boolean
  maxBytes: number
  recordElement: string
  silent: boolean
  tempDir: string
  url: string
  verbose: boolean
}

export type SyncPhase = 'cleanup' | 'download' | 'process' | 'report' | 'setup'

export interface SyncSummary {
  countries: number
  downloadMs: number
  filesCreated: number
  processMs: number
  records: number
  reportPath: string
  totalMs: number
}

/**
 * Receives user-facing progress. The CLI backs it with ora and `this.log`,
 * tests with a recording stub.
 */
export interface ProgressReporter {
  announce(message: string): void
  progress(message: string): void
  stop(): void
  success(message: string): void
  warn(message: string): void
}
