// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure, withDomainErrors } from "../trpc";

/**
 * tRPC router serving rendered RSS documents.
 */
export const feedsRouter = router({
  get: publicProcedure
    .input(z.object({ name: z.string().min(1) }))
    .query(({ ctx, input }) => withDomainErrors(() => ctx.service.getFeed(input.name))),
});
