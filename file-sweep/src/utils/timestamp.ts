function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Formats a date as `YYYYMMDD_HHMMSS`, suitable for file names
 *
 * @example
 * formatFileStamp(new Date(2024, 0, 5, 9, 3, 7))
 * // Returns: '20240105_090307'
 */
export function formatFileStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
