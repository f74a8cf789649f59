export type LivenessState = "starting" | "ready" | "draining";

/**
 * Readiness as seen by external health checks. Moves starting → ready → draining
 * and never back; once draining, `setReady()` does nothing.
 *
 * Request handlers and the signal listener all run on the event loop, so a plain
 * field is enough: no reader can observe a half-written state.
 */
export class LivenessFlag {
  private current: LivenessState = "starting";

  get state(): LivenessState {
    return this.current;
  }

  setReady(): void {
    if (this.current === "starting") {
      this.current = "ready";
    }
  }

  setDraining(): void {
    this.current = "draining";
  }

  isReady(): boolean {
    return this.current === "ready";
  }
}
