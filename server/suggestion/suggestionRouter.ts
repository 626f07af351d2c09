/**
 * Suggestion Router - Endpoints tRPC do Motor de Sugestões
 *
 * - metrics: definição e ordem das métricas
 * - suggest: sugestão para um dia (ou o último dia avaliado)
 * - predict: score predito para um vetor de métricas
 *
 * O repositório vem do contexto; cada chamada constrói seu próprio serviço,
 * com a configuração base lida das variáveis SUGGESTION_*.
 *
 * @version 1.0.0
 */

import { z } from "zod";
import { router, publicProcedure } from "../_core/trpc";
import { loadSuggestionConfigFromEnv, suggestionConfigSchema } from "./config/suggestion.config";
import { METRIC_COUNT, METRIC_DEFINITIONS } from "./types/suggestion.types";
import { isCalendarDay } from "./model/SatisfactionEntries";
import { SuggestionService } from "./service/SuggestionService";
import { handleSuggestionError } from "./utils/SuggestionErrors";

// ============================================================================
// SCHEMAS
// ============================================================================

const suggestSchema = z
  .object({
    day: z.string().refine(isCalendarDay, "Dia deve ser YYYY-MM-DD válido").optional(),
    seed: z.number().int().optional(),
    config: suggestionConfigSchema.partial().optional(),
  })
  .optional();

const predictSchema = z.object({
  metrics: z.array(z.number().finite()).length(METRIC_COUNT, `Esperadas ${METRIC_COUNT} métricas`),
});

// ============================================================================
// ROUTER
// ============================================================================

export const suggestionRouter = router({
  metrics: publicProcedure.query(() => METRIC_DEFINITIONS.map(definition => ({ ...definition }))),

  suggest: publicProcedure.input(suggestSchema).query(async ({ ctx, input }) => {
    try {
      const service = new SuggestionService(ctx.entryRepository, { config: loadSuggestionConfigFromEnv() });
      return await service.suggest(input ?? {});
    } catch (error) {
      handleSuggestionError(error, "suggestion.suggest");
    }
  }),

  predict: publicProcedure.input(predictSchema).query(async ({ ctx, input }) => {
    try {
      const service = new SuggestionService(ctx.entryRepository, { config: loadSuggestionConfigFromEnv() });
      const predictedScore = await service.predict(input.metrics);
      return { predictedScore };
    } catch (error) {
      handleSuggestionError(error, "suggestion.predict");
    }
  }),
});
