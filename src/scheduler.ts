import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import type { RefreshOrchestrator } from "./pipeline/orchestrator";

export type RefreshScheduler = {
  readonly stop: () => void;
};

/**
 * Starts one cron task per configured time of day. Each tick refreshes every
 * source through the orchestrator, the same entry point on-demand refreshes
 * use, so a tick never overlaps a manual refresh of the same source.
 *
 * @param orchestrator - Shared refresh orchestrator
 * @param config - Application configuration including schedule.refresh
 * @param logger - Logger instance for recording cycle events
 * @returns A RefreshScheduler with a stop() method halting every task
 */
export function createRefreshScheduler(
  orchestrator: Pick<RefreshOrchestrator, "refreshAll">,
  config: AppConfig,
  logger: Logger,
): RefreshScheduler {
  const tasks: Array<ScheduledTask> = config.schedule.refresh.map((expression) =>
    cron.schedule(expression, async () => {
      logger.info({ schedule: expression }, "scheduled refresh starting");
      try {
        await orchestrator.refreshAll();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "scheduled refresh failed unexpectedly");
      }
    }),
  );

  return {
    stop: () => {
      for (const task of tasks) {
        task.stop();
      }
    },
  };
}
