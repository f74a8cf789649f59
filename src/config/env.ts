import dotenv from "dotenv";
import { z } from "zod";
import { parseListenAddress } from "./listen-address.js";

dotenv.config();

const durationMs = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value ? Number(value) : fallback))
    .pipe(z.number().int().positive());

const envSchema = z.object({
  LISTEN_ADDR: z
    .string()
    .default(":9000")
    .transform((value, ctx) => {
      const address = parseListenAddress(value);
      if (!address) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "LISTEN_ADDR must look like host:port, [ipv6]:port or :port"
        });
        return z.NEVER;
      }
      return address;
    }),
  READ_TIMEOUT_MS: durationMs(5_000),
  WRITE_TIMEOUT_MS: durationMs(10_000),
  IDLE_TIMEOUT_MS: durationMs(15_000),
  SHUTDOWN_TIMEOUT_MS: durationMs(30_000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  REQUEST_ID_FORMAT: z.enum(["uuid", "timestamp"]).default("uuid")
});

export type EnvConfig = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): EnvConfig => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error("Environment validation error", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration. Check your .env file.");
  }

  return parsed.data;
};

const env = parseEnv(process.env);

export default env;
