import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { Logger } from "pino";
import { ReportWriteError } from "@pltools/core/errors";

export interface WriteReportOptions {
  reportsDir: string;
  filename: string;
  content: string;
  logger: Logger;
}

/**
 * Writes a report into the reports directory. A failed write is logged and
 * yields null; it never fails the run.
 */
export async function writeCsvReport(
  options: WriteReportOptions,
): Promise<string | null> {
  const { reportsDir, filename, content, logger } = options;
  const path = resolve(reportsDir, filename);

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf-8");
  } catch (err) {
    const failure = new ReportWriteError(
      path,
      err instanceof Error ? err.message : String(err),
    );
    logger.error({ errorCode: failure.errorCode, path }, failure.message);
    return null;
  }

  logger.info({ path }, `CSV report written to ${path}`);
  return path;
}
