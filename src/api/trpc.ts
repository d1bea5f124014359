import { initTRPC, TRPCError } from "@trpc/server";
import type { AppContext } from "./context";
import { FeedsmithError } from "../errors";
import type { ErrorCode } from "../errors";

const t = initTRPC.context<AppContext>().create();

/**
 * tRPC router factory for creating nested route definitions.
 */
export const router = t.router;

/**
 * tRPC public procedure factory for defining queries and mutations.
 */
export const publicProcedure = t.procedure;

/**
 * tRPC caller factory for calling procedures directly without HTTP transport.
 * Useful for testing procedures in isolation.
 */
export const createCallerFactory = t.createCallerFactory;

type TrpcCode = TRPCError["code"];

const CODE_MAP: Readonly<Record<ErrorCode, TrpcCode>> = {
  INVALID_URL: "BAD_REQUEST",
  MALFORMED_ENTRY: "BAD_REQUEST",
  DUPLICATE_ENTRY: "CONFLICT",
  DUPLICATE_SOURCE: "CONFLICT",
  SOURCE_NOT_FOUND: "NOT_FOUND",
  EXTRACTION_FAILED: "UNPROCESSABLE_CONTENT",
  NETWORK: "BAD_GATEWAY",
  RATE_LIMITED: "TOO_MANY_REQUESTS",
};

/**
 * Runs a service call and turns domain errors into tRPC errors with a
 * matching status, keeping the original as `cause`.
 */
export async function withDomainErrors<T>(call: () => T | Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof FeedsmithError) {
      throw new TRPCError({ code: CODE_MAP[err.code], message: err.message, cause: err });
    }
    throw err;
  }
}
