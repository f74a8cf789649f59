import { createApp } from "./app.js";
import env from "./config/env.js";
import { isStartupError } from "./lifecycle/errors.js";
import { LivenessFlag } from "./lifecycle/liveness.js";
import { ServerSession } from "./lifecycle/server-session.js";
import { ShutdownOrchestrator } from "./lifecycle/shutdown-orchestrator.js";
import { logger } from "./utils/logger.js";
import { createRequestIdGenerator } from "./utils/request-id.js";

const main = async () => {
  const liveness = new LivenessFlag();
  const app = createApp({
    liveness,
    logger,
    nextRequestId: createRequestIdGenerator(env.REQUEST_ID_FORMAT)
  });

  const session = new ServerSession({
    handler: app,
    address: env.LISTEN_ADDR,
    timeouts: {
      readTimeoutMs: env.READ_TIMEOUT_MS,
      writeTimeoutMs: env.WRITE_TIMEOUT_MS,
      idleTimeoutMs: env.IDLE_TIMEOUT_MS
    },
    logger
  });

  const orchestrator = new ShutdownOrchestrator({
    session,
    liveness,
    logger,
    shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS
  });

  await orchestrator.start();

  const report = await orchestrator.whenStopped();
  process.exit(report.outcome === "failed" ? 1 : 0);
};

void main().catch((error: unknown) => {
  logger.fatal(
    { err: error, code: isStartupError(error) ? error.code : undefined },
    "Server failed to start"
  );
  process.exit(1);
});
