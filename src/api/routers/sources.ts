// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure, withDomainErrors } from "../trpc";

const strategySchema = z.enum(["auto", "listing", "article"]);
const nameSchema = z.object({ name: z.string().min(1) });

/**
 * tRPC router for the source registry.
 * Registration, updates and removal go through the feed service so URL
 * normalization and duplicate checks apply to every caller.
 */
export const sourcesRouter = router({
  list: publicProcedure.query(({ ctx }) => ctx.service.listSources()),

  get: publicProcedure
    .input(nameSchema)
    .query(({ ctx, input }) => withDomainErrors(() => ctx.service.getSource(input.name))),

  register: publicProcedure
    .input(
      z.object({
        name: z.string().min(1),
        url: z.string().min(1),
        strategy: strategySchema.optional(),
        selector: z.string().min(1).nullable().optional(),
        category: z.string().min(1).nullable().optional(),
      }),
    )
    .mutation(({ ctx, input }) =>
      withDomainErrors(() => ctx.service.registerSource(input)),
    ),

  update: publicProcedure
    .input(
      z.object({
        name: z.string().min(1),
        url: z.string().min(1).optional(),
        strategy: strategySchema.optional(),
        selector: z.string().min(1).nullable().optional(),
        category: z.string().min(1).nullable().optional(),
      }),
    )
    .mutation(({ ctx, input }) => {
      const { name, ...updates } = input;
      return withDomainErrors(() => ctx.service.updateSource(name, updates));
    }),

  remove: publicProcedure
    .input(nameSchema)
    .mutation(({ ctx, input }) => ({ removed: ctx.service.removeSource(input.name) })),

  refresh: publicProcedure
    .input(nameSchema)
    .mutation(({ ctx, input, signal }) =>
      withDomainErrors(() => ctx.service.refreshOne(input.name, signal)),
    ),

  refreshAll: publicProcedure.mutation(({ ctx, signal }) =>
    withDomainErrors(() => ctx.service.refreshAll(signal)),
  ),

  discover: publicProcedure
    .input(z.object({ url: z.string().min(1) }))
    .query(({ ctx, input, signal }) =>
      withDomainErrors(() => ctx.service.discover(input.url, signal)),
    ),

  preview: publicProcedure
    .input(
      z.object({
        url: z.string().min(1),
        strategy: strategySchema.optional(),
        selector: z.string().min(1).nullable().optional(),
      }),
    )
    .query(({ ctx, input, signal }) =>
      withDomainErrors(() =>
        ctx.service.previewExtraction(input.url, {
          strategy: input.strategy,
          selector: input.selector,
          signal,
        }),
      ),
    ),
});
