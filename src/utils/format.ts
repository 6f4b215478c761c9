/**
 * Formatting utilities
 */

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, "0");
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  const day = [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
  ];
  const time = [
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ];
  return `${day.join("-")} ${time.join(":")}`;
}

/**
 * Filename-safe variant of formatTimestamp: `YYYY-MM-DD_HH-MM-SS`
 */
export function formatLogFileStamp(date: Date): string {
  return formatTimestamp(date).replace(" ", "_").replace(/:/g, "-");
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const tenths = Math.round(ms / 100);
  if (tenths < 600) return `${(tenths / 10).toFixed(1)}s`;
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  if (minutes < 60) return `${minutes}m ${totalSeconds % 60}s`;
  const hours = Math.floor(minutes / 60);
  return `${hours}h ${minutes % 60}m`;
}
