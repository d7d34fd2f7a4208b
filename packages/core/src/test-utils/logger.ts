import pino, { type Logger } from "pino";
import { z } from "zod";

const CapturedLogSchema = z.looseObject({
  level: z.number(),
  msg: z.string().optional(),
});

export type CapturedLog = z.infer<typeof CapturedLogSchema>;

export interface CaptureLogger {
  logger: Logger;
  records: CapturedLog[];
}

/** Pino logger that keeps every record in memory instead of writing it. */
export function createCaptureLogger(
  level: pino.LevelWithSilent = "debug",
): CaptureLogger {
  const records: CapturedLog[] = [];
  const logger = pino(
    { level },
    {
      write(line: string) {
        records.push(CapturedLogSchema.parse(JSON.parse(line)));
      },
    },
  );
  return { logger, records };
}
