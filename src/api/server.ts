// pattern: Imperative Shell
import express from "express";
import type { Response } from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import type { AppContext } from "./context";
import { FeedsmithError } from "../errors";
import type { ErrorCode } from "../errors";

const HTTP_STATUS: Readonly<Record<ErrorCode, number>> = {
  INVALID_URL: 400,
  MALFORMED_ENTRY: 400,
  DUPLICATE_ENTRY: 409,
  DUPLICATE_SOURCE: 409,
  SOURCE_NOT_FOUND: 404,
  EXTRACTION_FAILED: 422,
  NETWORK: 502,
  RATE_LIMITED: 429,
};

const OPML_BODY_TYPES = [
  "text/*",
  "application/xml",
  "application/opml+xml",
  "text/x-opml",
];

function sendError(res: Response, context: AppContext, err: unknown): void {
  if (err instanceof FeedsmithError) {
    res.status(HTTP_STATUS[err.code]).json({ error: err.message, code: err.code });
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  context.logger.error({ error: message }, "request failed");
  res.status(500).json({ error: "internal error" });
}

/**
 * Creates the Express app: the tRPC router at `/api/trpc`, plain HTTP
 * routes for feed readers (`/feed/<name>.xml`, OPML import and export) and
 * `/health` for container health checks.
 *
 * @returns Configured Express app instance (not started, the caller picks the port)
 */
export function createApiServer(context: AppContext): express.Express {
  const app = express();

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: () => context,
    }),
  );

  app.get("/feed/:file", (req, res) => {
    const file = req.params["file"] ?? "";
    if (!file.endsWith(".xml")) {
      res.status(404).json({ error: "not found" });
      return;
    }
    try {
      const xml = context.service.getFeed(file.slice(0, -".xml".length));
      res.type("application/rss+xml; charset=utf-8").send(xml);
    } catch (err) {
      sendError(res, context, err);
    }
  });

  app.get("/export/opml", (_req, res) => {
    res
      .type("text/x-opml; charset=utf-8")
      .attachment("feedsmith.opml")
      .send(context.service.exportOpml());
  });

  app.post(
    "/import/opml",
    express.text({ type: OPML_BODY_TYPES, limit: "2mb" }),
    (req, res) => {
      const body: unknown = req.body;
      if (typeof body !== "string" || body.trim() === "") {
        res.status(400).json({ error: "expected an OPML document in the request body" });
        return;
      }
      try {
        const summary = context.service.importOpml(body);
        res.json({
          accepted: summary.accepted.map((source) => source.name),
          rejected: summary.rejected.map(({ entry, reason }) => ({
            url: entry.url,
            title: entry.title,
            code: reason.code,
            reason: reason.message,
          })),
        });
      } catch (err) {
        sendError(res, context, err);
      }
    },
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  return app;
}
