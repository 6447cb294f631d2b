export function nowMs(): number {
  return Date.now();
}

export function elapsedMs(startMs: number): number {
  return Date.now() - startMs;
}

/** ISO-8601 UTC at second resolution: `2025-10-21T08:15:02Z`. */
export function isoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** File-name stamp in UTC: `20251021_081502`. */
export function fileStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}` +
    `_${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}${pad2(date.getUTCSeconds())}`
  );
}

/** `2025-10-21 08:15:02 UTC`, for human-facing views. */
export function displayTime(date: Date): string {
  return `${isoSeconds(date).replace("T", " ").replace("Z", "")} UTC`;
}
