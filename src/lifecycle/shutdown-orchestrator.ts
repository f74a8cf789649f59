import type { AddressInfo } from "node:net";
import type { Logger } from "pino";
import { ShutdownError, StartupError } from "./errors.js";
import type { LivenessFlag } from "./liveness.js";
import type { DrainResult } from "./server-session.js";

export type OrchestratorState = "starting" | "serving" | "draining" | "stopped";

export type ShutdownOutcome = "drained" | "forced" | "failed";

export type ShutdownReport = {
  reason: string;
  outcome: ShutdownOutcome;
  abandoned: number;
  durationMs: number;
  error?: ShutdownError;
};

type SignalListener = (signal: NodeJS.Signals) => void;

/** The slice of `process` the orchestrator listens on; tests pass an EventEmitter. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

/** The slice of ServerSession the orchestrator drives. */
export interface DrainableSession {
  readonly address: string;
  readonly inFlightCount: number;
  listen(): Promise<AddressInfo>;
  stopAccepting(): void;
  drain(deadlineMs: number): Promise<DrainResult>;
}

export type ShutdownOrchestratorOptions = {
  session: DrainableSession;
  liveness: LivenessFlag;
  logger: Logger;
  shutdownTimeoutMs: number;
  signals?: readonly NodeJS.Signals[];
  signalSource?: SignalSource;
  exit?: (code: number) => void;
  now?: () => number;
};

const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Drives one server lifetime: starting → serving → draining → stopped.
 *
 * The first termination signal flips the liveness flag, stops intake on the
 * session and waits for in-flight requests up to `shutdownTimeoutMs`, forcing the
 * rest closed after that. A second signal while draining exits with code 1 on the
 * spot. Once stopped the handlers are removed, so any later signal gets the OS
 * default behaviour.
 */
export class ShutdownOrchestrator {
  private current: OrchestratorState = "starting";
  private pendingSignal: NodeJS.Signals | undefined;
  private startup: Promise<AddressInfo> | undefined;
  private shutdownInProgress: Promise<ShutdownReport> | undefined;
  private resolveStopped: (report: ShutdownReport) => void = () => undefined;
  private readonly stopped = new Promise<ShutdownReport>((resolve) => {
    this.resolveStopped = resolve;
  });

  private readonly session: DrainableSession;
  private readonly liveness: LivenessFlag;
  private readonly logger: Logger;
  private readonly shutdownTimeoutMs: number;
  private readonly signals: readonly NodeJS.Signals[];
  private readonly signalSource: SignalSource;
  private readonly exit: (code: number) => void;
  private readonly now: () => number;

  constructor(options: ShutdownOrchestratorOptions) {
    this.session = options.session;
    this.liveness = options.liveness;
    this.logger = options.logger;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs;
    this.signals = options.signals ?? DEFAULT_SIGNALS;
    this.signalSource = options.signalSource ?? process;
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.now = options.now ?? Date.now;
  }

  get state(): OrchestratorState {
    return this.current;
  }

  /** Resolves once the orchestrator reaches `stopped`. */
  whenStopped(): Promise<ShutdownReport> {
    return this.stopped;
  }

  /**
   * Registers the signal handlers and binds the session. One call per
   * orchestrator; calling it again, or after a shutdown, rejects with
   * `invalid_state`.
   */
  start(): Promise<AddressInfo> {
    if (this.startup || this.current !== "starting") {
      return Promise.reject(
        new StartupError({ code: "invalid_state", message: `Cannot start a server that is already ${this.current}` })
      );
    }
    this.startup = this.bind();
    return this.startup;
  }

  private async bind(): Promise<AddressInfo> {
    this.registerSignalHandlers();

    let bound: AddressInfo;
    try {
      bound = await this.session.listen();
    } catch (error) {
      this.unregisterSignalHandlers();
      throw error;
    }

    if (this.pendingSignal) {
      this.logger.info({ signal: this.pendingSignal }, "Termination signal arrived during startup");
      void this.shutdown(this.pendingSignal);
      return bound;
    }
    // shutdown() was called while binding; its drain runs once this resolves.
    if (this.shutdownInProgress) {
      return bound;
    }

    this.current = "serving";
    this.liveness.setReady();
    this.logger.info({ address: this.session.address, port: bound.port }, "Server is ready to handle requests");
    return bound;
  }

  /**
   * Starts the drain, or joins the one already running. Never rejects: a failed
   * shutdown comes back as a report with outcome `failed`.
   */
  shutdown(reason: string): Promise<ShutdownReport> {
    if (!this.shutdownInProgress) {
      const startup = this.current === "starting" ? this.startup : undefined;
      this.shutdownInProgress = startup
        ? startup.then(
            () => this.drain(reason),
            () => this.drain(reason)
          )
        : this.drain(reason);
    }
    return this.shutdownInProgress;
  }

  private readonly onSignal = (signal: NodeJS.Signals): void => {
    switch (this.current) {
      case "starting":
        this.pendingSignal ??= signal;
        return;
      case "serving":
        this.logger.info({ signal }, "Server is shutting down...");
        void this.shutdown(signal);
        return;
      case "draining":
        this.logger.fatal({ signal }, "Second termination signal while draining; exiting immediately");
        this.exit(1);
        return;
      case "stopped":
        return;
    }
  };

  private registerSignalHandlers(): void {
    try {
      for (const signal of this.signals) {
        this.signalSource.on(signal, this.onSignal);
      }
    } catch (error) {
      this.unregisterSignalHandlers();
      throw new StartupError({
        code: "signal_registration_failed",
        message: "Could not register termination signal handlers",
        cause: error
      });
    }
  }

  private unregisterSignalHandlers(): void {
    for (const signal of this.signals) {
      this.signalSource.off(signal, this.onSignal);
    }
  }

  private async drain(reason: string): Promise<ShutdownReport> {
    const startedAt = this.now();

    this.current = "draining";
    this.liveness.setDraining();
    this.session.stopAccepting();

    this.logger.info(
      { reason, inFlight: this.session.inFlightCount, timeoutMs: this.shutdownTimeoutMs },
      "Draining in-flight requests"
    );

    let report: ShutdownReport;
    try {
      const result = await this.session.drain(this.shutdownTimeoutMs);
      if (result.forced) {
        this.logger.warn(
          { abandoned: result.abandoned, timeoutMs: this.shutdownTimeoutMs },
          "Drain deadline exceeded; forcing remaining connections closed"
        );
      }
      report = {
        reason,
        outcome: result.forced ? "forced" : "drained",
        abandoned: result.abandoned,
        durationMs: this.now() - startedAt
      };
    } catch (error) {
      const failure =
        error instanceof ShutdownError
          ? error
          : new ShutdownError({ code: "drain_failed", message: "Could not gracefully shutdown the server", cause: error });
      this.logger.fatal({ err: failure, reason }, "Could not gracefully shutdown the server");
      report = { reason, outcome: "failed", abandoned: 0, durationMs: this.now() - startedAt, error: failure };
    }

    this.current = "stopped";
    this.unregisterSignalHandlers();
    this.logger.info({ reason, outcome: report.outcome, durationMs: report.durationMs }, "Server stopped");
    this.resolveStopped(report);
    return report;
  }
}
