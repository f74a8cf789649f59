import { randomUUID } from "crypto";

export type RequestIdGenerator = () => string;

export type RequestIdFormat = "uuid" | "timestamp";

export const randomRequestId: RequestIdGenerator = () => randomUUID();

const NANOS_PER_MILLI = 1_000_000n;

const epochNanos = (): bigint => BigInt(Date.now()) * NANOS_PER_MILLI;

/**
 * Epoch-nanosecond ids, strictly increasing within the process. Two calls that read
 * the same clock value get consecutive numbers.
 */
export const createTimestampRequestIdGenerator = (clock: () => bigint = epochNanos): RequestIdGenerator => {
  let last = 0n;
  return () => {
    const now = clock();
    last = now > last ? now : last + 1n;
    return last.toString();
  };
};

export const createRequestIdGenerator = (format: RequestIdFormat): RequestIdGenerator =>
  format === "timestamp" ? createTimestampRequestIdGenerator() : randomRequestId;
