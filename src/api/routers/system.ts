// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const sources = ctx.service.listSources();

    let lastRefreshAt: Date | null = null;
    for (const source of sources) {
      if (
        source.lastRefreshAt !== null &&
        (lastRefreshAt === null || source.lastRefreshAt > lastRefreshAt)
      ) {
        lastRefreshAt = source.lastRefreshAt;
      }
    }

    return {
      lastRefreshAt,
      refreshCron: ctx.config.schedule.refresh,
      sourceCount: sources.length,
      failingCount: sources.filter((s) => s.lastStatus === "error").length,
      itemCount: sources.reduce((sum, s) => sum + s.itemCount, 0),
    };
  }),
});
