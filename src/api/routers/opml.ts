// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure, withDomainErrors } from "../trpc";

export const opmlRouter = router({
  import: publicProcedure
    .input(z.object({ document: z.string().min(1) }))
    .mutation(({ ctx, input }) =>
      withDomainErrors(() => {
        const summary = ctx.service.importOpml(input.document);
        // rejection reasons are Error instances, which do not survive JSON
        return {
          accepted: summary.accepted,
          rejected: summary.rejected.map(({ entry, reason }) => ({
            entry,
            code: reason.code,
            reason: reason.message,
          })),
        };
      }),
    ),

  export: publicProcedure.query(({ ctx }) => ctx.service.exportOpml()),
});
