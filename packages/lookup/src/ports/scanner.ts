export type ScanResult<T> = {
  readonly value: T
  /** Number of characters of the input the scan used. */
  readonly consumed: number
}

/**
 * Parse capability for field types outside the built-in kinds.
 *
 * `scan` receives the raw value with leading blanks removed. It returns the
 * parsed value and how much of the input it used, and throws when the input
 * does not start with a valid representation. The caller rejects scans that
 * consume nothing or leave anything but blanks before the end of the line.
 */
export interface FieldScanner<T> {
  scan(input: string): ScanResult<T>
}
