import type { AxiosRequestConfig } from 'axios'

import axios from 'axios'
import { createWriteStream, existsSync, renameSync, rmSync, statSync } from 'node:fs'
import { Transform } from 'node:stream'
import { pipeline } from 'node:stream/promises'

import { NetworkError, toFilesystemError } from '../errors.js'

export const DEFAULT_EXPORT_URL = 'https://directory.peppol.eu/export/businesscards'
export const EXPORT_FILE_NAME = 'directory-export-business-cards.xml'
const DOWNLOAD_SUFFIX = '.download'

export interface DownloadResponse {
  data: NodeJS.ReadableStream
  headers: Record<string, unknown>
  status: number
  statusText: string
}

export interface HttpClient {
  get(url: string, config: AxiosRequestConfig): Promise<DownloadResponse>
}

export interface DownloadProgress {
  receivedBytes: number
  totalBytes: number | undefined
}

export interface DownloadOptions {
  destination: string
  force?: boolean
  onProgress?: (progress: DownloadProgress) => void
  timeoutMs?: number
  url: string
}

export interface DownloadResult {
  path: string
  reused: boolean
  sizeBytes: number
}

function contentLength(headers: Record<string, unknown>): number | undefined {
  const value = Number(headers['content-length'])
  return Number.isFinite(value) && value > 0 ? value : undefined
}

/**
 * Streams the export to disk. The body goes to a `.download` file first and
 * is renamed once complete, so an interrupted download is never mistaken for
 * a finished one on the next run.
 */
export async function downloadExport(options: DownloadOptions, client: HttpClient = axios): Promise<DownloadResult> {
  const { destination, url } = options

  if (!options.force && existsSync(destination)) {
    return { path: destination, reused: true, sizeBytes: statSync(destination).size }
  }

  let response: DownloadResponse
  try {
    response = await client.get(url, {
      responseType: 'stream',
      timeout: options.timeoutMs ?? 60_000,
      validateStatus: () => true,
    })
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    throw new NetworkError(`Failed to download from ${url}: ${detail}`, { url }, { cause: error })
  }

  if (response.status < 200 || response.status >= 300) {
    if ('destroy' in response.data && typeof response.data.destroy === 'function') {
      response.data.destroy()
    }

    throw new NetworkError(`Failed to download from ${url}: bad status ${response.status} ${response.statusText}`, {
      status: response.status,
      url,
    })
  }

  const totalBytes = contentLength(response.headers)
  let receivedBytes = 0
  const counter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      receivedBytes += chunk.length
      options.onProgress?.({ receivedBytes, totalBytes })
      callback(null, chunk)
    },
  })

  const partial = `${destination}${DOWNLOAD_SUFFIX}`
  try {
    await pipeline(response.data, counter, createWriteStream(partial))
  } catch (error) {
    rmSync(partial, { force: true })
    // errors from the file side carry the path they failed on
    if (error instanceof Error && 'path' in error) {
      throw toFilesystemError('write', partial, error)
    }

    const detail = error instanceof Error ? error.message : String(error)
    throw new NetworkError(`Download from ${url} was interrupted: ${detail}`, { receivedBytes, url }, { cause: error })
  }

  try {
    renameSync(partial, destination)
  } catch (error) {
    throw toFilesystemError('rename', partial, error)
  }

  return { path: destination, reused: false, sizeBytes: receivedBytes }
}
