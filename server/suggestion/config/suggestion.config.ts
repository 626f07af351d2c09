/**
 * Configuração do Motor de Sugestões
 *
 * Valores padrão e validação (zod) dos parâmetros do k-NN e do annealing.
 * Variáveis de ambiente sobrescrevem os padrões via loadSuggestionConfigFromEnv().
 *
 * @version 1.0.0
 */

import { z } from "zod";
import { ConfigInvalidError } from "../utils/SuggestionErrors";

// ============================================================================
// SCHEMA
// ============================================================================

export const objectiveSourceSchema = z.enum(["REPORTED_SCORE", "PREDICTED_SCORE"]);

export const suggestionConfigSchema = z.object({
  /** Número de vizinhos do k-NN */
  k: z.number().int().min(1).default(5),
  /** Temperatura inicial do annealing */
  initialTemperature: z.number().positive().default(100),
  /** Fator multiplicativo de resfriamento por iteração */
  coolingRate: z.number().positive().max(1).default(0.95),
  /** Amplitude máxima da perturbação, em unidades escaladas [0, 1] */
  stepSize: z.number().positive().max(1).default(0.05),
  /** Iterações por restart */
  maxIterations: z.number().int().min(0).default(1000),
  /** Restarts independentes (<= 0 equivale a 1) */
  numRestarts: z.number().int().default(1),
  /** Piso da temperatura, mantém exp(delta / T) estável */
  minTemperature: z.number().positive().default(1e-3),
  /** Valor corrente inicial: score informado ou predição do regressor */
  objective: objectiveSourceSchema.default("REPORTED_SCORE"),
});

export type SuggestionConfig = z.infer<typeof suggestionConfigSchema>;
export type SuggestionConfigInput = z.input<typeof suggestionConfigSchema>;

export const DEFAULT_SUGGESTION_CONFIG: SuggestionConfig = suggestionConfigSchema.parse({});

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Valida e completa uma configuração parcial.
 * Lança ConfigInvalidError com o primeiro campo inválido.
 */
export function resolveSuggestionConfig(input: SuggestionConfigInput = {}): SuggestionConfig {
  const parsed = suggestionConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join(".") : "config";
    throw new ConfigInvalidError(field, issue.message);
  }

  return parsed.data;
}

/**
 * Aplica sobrescritas parciais sobre uma configuração já resolvida.
 * Campos undefined mantêm o valor base.
 */
export function mergeSuggestionConfig(
  base: SuggestionConfig,
  overrides: SuggestionConfigInput = {}
): SuggestionConfig {
  return resolveSuggestionConfig({
    k: overrides.k ?? base.k,
    initialTemperature: overrides.initialTemperature ?? base.initialTemperature,
    coolingRate: overrides.coolingRate ?? base.coolingRate,
    stepSize: overrides.stepSize ?? base.stepSize,
    maxIterations: overrides.maxIterations ?? base.maxIterations,
    numRestarts: overrides.numRestarts ?? base.numRestarts,
    minTemperature: overrides.minTemperature ?? base.minTemperature,
    objective: overrides.objective ?? base.objective,
  });
}

/**
 * Normaliza numRestarts (zero ou negativo vira 1)
 */
export function effectiveRestarts(numRestarts: number): number {
  return Math.max(1, Math.floor(numRestarts));
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

const ENV_KEYS = {
  k: "SUGGESTION_K",
  initialTemperature: "SUGGESTION_INITIAL_TEMPERATURE",
  coolingRate: "SUGGESTION_COOLING_RATE",
  stepSize: "SUGGESTION_STEP_SIZE",
  maxIterations: "SUGGESTION_MAX_ITERATIONS",
  numRestarts: "SUGGESTION_NUM_RESTARTS",
  minTemperature: "SUGGESTION_MIN_TEMPERATURE",
} as const;

type NumericConfigKey = keyof typeof ENV_KEYS;

const NUMERIC_KEYS: readonly NumericConfigKey[] = [
  "k",
  "initialTemperature",
  "coolingRate",
  "stepSize",
  "maxIterations",
  "numRestarts",
  "minTemperature",
];

function readNumber(env: NodeJS.ProcessEnv, key: NumericConfigKey): number | undefined {
  const raw = env[ENV_KEYS[key]];
  if (raw === undefined || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigInvalidError(ENV_KEYS[key], `"${raw}" is not a number`);
  }
  return value;
}

/**
 * Carrega configuração a partir de variáveis de ambiente
 */
export function loadSuggestionConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SuggestionConfig {
  const input: SuggestionConfigInput = {};

  for (const key of NUMERIC_KEYS) {
    const value = readNumber(env, key);
    if (value !== undefined) {
      input[key] = value;
    }
  }

  const objective = env.SUGGESTION_OBJECTIVE?.trim();
  if (objective) {
    const parsed = objectiveSourceSchema.safeParse(objective.toUpperCase());
    if (!parsed.success) {
      throw new ConfigInvalidError("SUGGESTION_OBJECTIVE", `"${objective}" is not a valid objective`);
    }
    input.objective = parsed.data;
  }

  return resolveSuggestionConfig(input);
}
