import { router } from "./_core/trpc";
import { suggestionRouter } from "./suggestion/suggestionRouter";

export const appRouter = router({
  suggestion: suggestionRouter,
});

export type AppRouter = typeof appRouter;
