/**
 * @fileoverview Small text formatting helpers shared by builtins.
 *
 * @module utils/format
 */

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Format a date in local time as `YYYY-MM-DD HH:MM`, or
 * `YYYY-MM-DD HH:MM:SS` when `withSeconds` is set.
 */
export function formatDateTime(date: Date, withSeconds = false): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
  return withSeconds ? `${day} ${time}:${pad2(date.getSeconds())}` : `${day} ${time}`;
}

/** Bytes as gigabytes with one decimal, e.g. 1610612736 → "1.5". */
export function formatGigabytes(bytes: number): string {
  return (bytes / 1024 ** 3).toFixed(1);
}

/** Permission bits of a file mode as three octal digits, e.g. 0o100644 → "644". */
export function formatPermissions(mode: number): string {
  return (mode & 0o777).toString(8).padStart(3, '0');
}
