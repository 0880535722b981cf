const BYTES_PER_MEGABYTE = 1024 * 1024

/**
 * Formats a byte count as megabytes with two decimals.
 */
export function formatMegabytes(bytes: number): string {
  return (bytes / BYTES_PER_MEGABYTE).toFixed(2)
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US')
}

export function formatDuration(milliseconds: number): string {
  return `${(milliseconds / 1000).toFixed(1)}s`
}

/**
 * Items per second, rounded. Zero when no time has passed.
 */
export function formatRate(items: number, milliseconds: number): string {
  if (milliseconds <= 0) return '0'
  return Math.round((items * 1000) / milliseconds).toLocaleString('en-US')
}

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0')
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}
