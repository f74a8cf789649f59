import { EventEmitter } from "node:events";
import { pino, type DestinationStream, type LevelWithSilent, type Logger } from "pino";
import env from "../config/env.js";

/**
 * Log sink wrapper whose writes never throw. Lines the target refuses, either by
 * throwing or by emitting `error`, are counted instead of surfacing to the caller.
 */
export class BestEffortDestination implements DestinationStream {
  private dropped = 0;

  constructor(private readonly target: DestinationStream = process.stdout) {
    if (target instanceof EventEmitter) {
      target.on("error", () => {
        this.dropped += 1;
      });
    }
  }

  get droppedLines(): number {
    return this.dropped;
  }

  write(line: string): void {
    try {
      this.target.write(line);
    } catch {
      this.dropped += 1;
    }
  }
}

export type LoggerOptions = {
  level: LevelWithSilent;
  destination?: DestinationStream;
};

export const createLogger = ({ level, destination }: LoggerOptions): Logger => {
  const sink =
    destination instanceof BestEffortDestination ? destination : new BestEffortDestination(destination);
  return pino({ name: "http", level }, sink);
};

export const logger = createLogger({ level: env.LOG_LEVEL });
