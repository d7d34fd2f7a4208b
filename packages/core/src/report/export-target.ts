/** Whether and under which file name a CSV report is written. */
export type ExportTarget =
  | { kind: "disabled" }
  | { kind: "default-name" }
  | { kind: "named"; filename: string };

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * File name for a report, or null when export is disabled. Default names are
 * `<command>_report-<timestamp>.csv`.
 */
export function resolveReportFilename(
  target: ExportTarget,
  command: string,
  now: Date = new Date(),
): string | null {
  switch (target.kind) {
    case "disabled":
      return null;
    case "default-name":
      return `${command}_report-${formatTimestamp(now)}.csv`;
    case "named":
      return target.filename;
  }
}
