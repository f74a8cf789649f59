import type { LevelWithSilent } from "pino";
import { z } from "zod";
import { BestEffortDestination, createLogger } from "../utils/logger.js";

const logLineSchema = z.record(z.string(), z.unknown());

export type LogLine = z.infer<typeof logLineSchema>;

/** pino numeric levels, for asserting on captured lines. */
export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50, fatal: 60 } as const;

export const createLogCapture = (level: LevelWithSilent = "debug") => {
  const lines: LogLine[] = [];
  const destination = new BestEffortDestination({
    write: (line: string) => {
      lines.push(logLineSchema.parse(JSON.parse(line)));
    }
  });
  const logger = createLogger({ level, destination });

  const withMessage = (msg: string) => lines.filter((line) => line.msg === msg);

  return { logger, lines, destination, withMessage };
};
