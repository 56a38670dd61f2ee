/**
 * Formatting Helpers
 *
 * Short human-readable renderings used in CLI output.
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

// ============================================================================
// Durations and Counts
// ============================================================================

/**
 * Format a duration: `45s`, `2:05` (m:ss) or `1:02:05` (h:mm:ss).
 */
export function fmtSeconds(seconds: number): string {
  const s = Math.trunc(seconds)
  if (s < 60) {
    return `${s}s`
  }
  if (s < 3600) {
    return `${Math.floor(s / 60)}:${pad(s % 60)}`
  }
  return `${Math.floor(s / 3600)}:${pad(Math.floor(s / 60) % 60)}:${pad(s % 60)}`
}

/**
 * Join items as `a`, `a and b` or `a, b and c`. Empty or missing lists give `none`.
 */
export function fmtList(items: readonly unknown[] | null | undefined, none = '-'): string {
  if (!items || items.length === 0) {
    return none
  }
  const text = items.map(String)
  const last = text.pop() ?? ''
  return text.length === 0 ? last : `${text.join(', ')} and ${last}`
}

/**
 * Abbreviate large numbers: `12G`, `34M`, `56.79K`. Below 10,000 the number is
 * printed as is.
 */
export function fmtBigNumber(value: number): string {
  if (value >= 1e10) {
    return `${Math.floor(value / 1e9)}G`
  }
  if (value >= 1e7) {
    return `${Math.floor(value / 1e6)}M`
  }
  if (value >= 1e4) {
    return `${Math.round((value / 1e3) * 100) / 100}K`
  }
  return String(value)
}

const BYTE_UNITS = ['KB', 'MB', 'GB', 'TB'] as const

/**
 * Format a byte count with binary units: `512 B`, `1.5 KB`, `2.0 MB`.
 */
export function fmtBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`
  }
  let size = bytes / 1024
  let unit: string = BYTE_UNITS[0]
  for (const next of BYTE_UNITS.slice(1)) {
    if (size < 1024) break
    size /= 1024
    unit = next
  }
  return `${size.toFixed(1)} ${unit}`
}

// ============================================================================
// Dates and Times (local time)
// ============================================================================

/** YYYY-MM-DD */
export function fmtDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

/** HH:MM:SS */
export function fmtTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

/** YYYY-MM-DD HH:MM:SS */
export function fmtDatetime(date: Date): string {
  return `${fmtDate(date)} ${fmtTime(date)}`
}

export function fmtNow(): string {
  return fmtDatetime(new Date())
}
