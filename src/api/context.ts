// pattern: Functional Core
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { FeedService } from "../service";

/**
 * tRPC context type passed to all procedures.
 * Carries the feed service, application configuration and structured logger.
 */
export type AppContext = {
  readonly service: FeedService;
  readonly config: AppConfig;
  readonly logger: Logger;
};
