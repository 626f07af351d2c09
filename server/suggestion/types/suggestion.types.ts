/**
 * Suggestion Types - Tipos do Motor de Sugestões de Satisfação
 *
 * Define o contrato compartilhado por todos os componentes do motor:
 * - Ordem fixa das 9 métricas de saúde (MetricVector)
 * - Score de satisfação como tipo soma (SCORED | UNSCORED)
 * - Entradas diárias, candidatos e resultado da otimização
 *
 * IMPORTANTE: A ordem de METRIC_KEYS é o contrato entre scaler, regressor e
 * otimizador. NÃO reordenar.
 *
 * @version 1.0.0
 */

// ============================================================================
// METRICS
// ============================================================================

export const METRIC_KEYS = [
  "stepsToday",
  "timeInBedLastNight",
  "activeEnergyToday",
  "exerciseMinutesToday",
  "standHoursToday",
  "daylightTimeToday",
  "distanceWalkingToday",
  "flightsClimbedToday",
  "restingHeartRateToday",
] as const;

export type MetricKey = typeof METRIC_KEYS[number];

export const METRIC_COUNT = METRIC_KEYS.length;

export interface MetricDefinition {
  key: MetricKey;
  label: string;
  unit: string;
}

export const METRIC_DEFINITIONS: readonly MetricDefinition[] = [
  { key: "stepsToday", label: "Steps", unit: "steps" },
  { key: "timeInBedLastNight", label: "Time in bed", unit: "min" },
  { key: "activeEnergyToday", label: "Active energy", unit: "kcal" },
  { key: "exerciseMinutesToday", label: "Exercise", unit: "min" },
  { key: "standHoursToday", label: "Stand hours", unit: "h" },
  { key: "daylightTimeToday", label: "Time in daylight", unit: "min" },
  { key: "distanceWalkingToday", label: "Walking distance", unit: "m" },
  { key: "flightsClimbedToday", label: "Flights climbed", unit: "flights" },
  { key: "restingHeartRateToday", label: "Resting heart rate", unit: "bpm" },
];

/**
 * Vetor ordenado de métricas (mesma ordem de METRIC_KEYS para dados do usuário;
 * scaler e regressor aceitam qualquer dimensão consistente)
 */
export type MetricVector = readonly number[];

export type MetricRecord = Record<MetricKey, number>;

// ============================================================================
// SATISFACTION SCORE (SUM TYPE)
// ============================================================================

export interface ScoredSatisfaction {
  kind: "SCORED";
  value: number;
}

export interface UnscoredSatisfaction {
  kind: "UNSCORED";
}

/**
 * Score de satisfação do dia - ausência é explícita, nunca null
 */
export type SatisfactionScore = ScoredSatisfaction | UnscoredSatisfaction;

export const UNSCORED: UnscoredSatisfaction = { kind: "UNSCORED" };

export function scored(value: number): ScoredSatisfaction {
  return { kind: "SCORED", value };
}

export function isScored(score: SatisfactionScore): score is ScoredSatisfaction {
  return score.kind === "SCORED";
}

// ============================================================================
// ENTRIES
// ============================================================================

/**
 * Registro diário (um por dia, `day` no formato YYYY-MM-DD)
 */
export interface SatisfactionEntry {
  day: string;
  score: SatisfactionScore;
  metrics: MetricVector;
}

/**
 * Entrada com score garantido (subconjunto usado no treino)
 */
export interface ScoredEntry extends SatisfactionEntry {
  score: ScoredSatisfaction;
}

export function hasScore(entry: SatisfactionEntry): entry is ScoredEntry {
  return isScored(entry.score);
}

// ============================================================================
// OPTIMIZATION
// ============================================================================

/**
 * Origem do valor de um candidato:
 * - REPORTED: score informado pelo usuário (apenas ponto de partida)
 * - PREDICTED: score estimado pelo regressor
 */
export type CandidateOrigin = "REPORTED" | "PREDICTED";

export interface Candidate {
  metrics: MetricVector;
  value: number;
  origin: CandidateOrigin;
}

export interface RestartSummary {
  restartIndex: number;
  startDay: string;
  startValue: number;
  bestValue: number;
  acceptedMoves: number;
  iterations: number;
}

export interface OptimizationResult {
  /** Entrada fabricada com o melhor vetor (day = dia do ponto de partida) */
  bestEntry: SatisfactionEntry;
  bestValue: number;
  bestOrigin: CandidateOrigin;
  /** Valor corrente inicial do restart 0 */
  initialValue: number;
  /** Candidatos aceitos, em ordem, concatenados entre restarts */
  history: Candidate[];
  restarts: RestartSummary[];
  seed: number;
  iterations: number;
  executionTimeMs: number;
}

// ============================================================================
// SUGGESTIONS
// ============================================================================

export type DeltaDirection = "INCREASE" | "DECREASE" | "UNCHANGED";

export interface MetricDelta {
  key: MetricKey;
  label: string;
  unit: string;
  current: number;
  suggested: number;
  delta: number;
  /** |trunc(delta)| - valor exibido ao usuário */
  magnitude: number;
  direction: DeltaDirection;
}
