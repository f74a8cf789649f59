export type StartupErrorCode = "bind_failed" | "signal_registration_failed" | "invalid_state";
export type ShutdownErrorCode = "drain_failed";

export class LifecycleError<Code extends string = string> extends Error {
  public readonly code: Code;

  public constructor({ code, message, cause }: { code: Code; message: string; cause?: unknown }) {
    super(message, { cause });
    this.name = "LifecycleError";
    this.code = code;
  }
}

/** Fatal before serving begins; the process should exit non-zero without retrying. */
export class StartupError extends LifecycleError<StartupErrorCode> {
  public constructor(input: { code: StartupErrorCode; message: string; cause?: unknown }) {
    super(input);
    this.name = "StartupError";
  }
}

export class ShutdownError extends LifecycleError<ShutdownErrorCode> {
  public constructor(input: { code: ShutdownErrorCode; message: string; cause?: unknown }) {
    super(input);
    this.name = "ShutdownError";
  }
}

export const isStartupError = (value: unknown): value is StartupError => value instanceof StartupError;
