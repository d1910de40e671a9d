// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT DATES — Local-Time Formatting
// ═══════════════════════════════════════════════════════════════════════════════

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

function datePart(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

/** `yyyy-MM-dd HH:mm` */
export function formatSavedDate(date: Date): string {
  return `${datePart(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** `yyyy-MM-ddTHH:mm:ss`, no zone suffix */
export function formatLocalDateTime(date: Date): string {
  return `${datePart(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** `yyyy-MM-dd_HHmm`, safe inside file names */
export function formatFileTimestamp(date: Date): string {
  return `${datePart(date)}_${pad(date.getHours())}${pad(date.getMinutes())}`;
}
