// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Represents an object with a stop method for graceful shutdown.
 */
export type Stoppable = {
  readonly stop: () => void;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  /** Cancels in-flight refreshes before the database goes away. */
  readonly orchestrator: Stoppable;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT signal handlers for graceful shutdown.
 * Stops schedulers, cancels refreshes, closes the database, then exits.
 *
 * - Guards against double shutdown on re-entrant signal delivery
 * - Each cleanup step runs even when an earlier one throws
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const attempt = (step: string, action: () => void): void => {
    try {
      action();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message, step }, "shutdown step failed");
    }
  };

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      attempt("scheduler", () => scheduler.stop());
    }

    attempt("orchestrator", () => deps.orchestrator.stop());

    attempt("database", () => {
      deps.closeDb();
      deps.logger.info("database connection closed");
    });

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
