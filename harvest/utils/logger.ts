import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type { Logger };

/** Error-level JSON lines: ISO time, level label, message. */
export function createErrorLogger(stream: DestinationStream): Logger {
  return pino(
    {
      level: "error",
      base: null,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    stream,
  );
}

export function createFileLogger(file: string): Logger {
  return createErrorLogger(pino.destination({ dest: file, append: true, mkdir: true, sync: true }));
}
