// pattern: Imperative Shell
import { router } from "./trpc";
import { sourcesRouter } from "./routers/sources";
import { feedsRouter } from "./routers/feeds";
import { opmlRouter } from "./routers/opml";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router combining the sources, feeds, OPML and system sub-routers.
 */
export const appRouter = router({
  sources: sourcesRouter,
  feeds: feedsRouter,
  opml: opmlRouter,
  system: systemRouter,
});

/**
 * Inferred type of the root tRPC router.
 */
export type AppRouter = typeof appRouter;
