/**
 * Construção e conversão de SatisfactionEntry
 */

import {
  METRIC_COUNT,
  METRIC_KEYS,
  type MetricRecord,
  type MetricVector,
  type SatisfactionEntry,
  type SatisfactionScore,
  type ScoredEntry,
  UNSCORED,
  hasScore,
  scored,
} from "../types/suggestion.types";
import { ConfigInvalidError, DimensionMismatchError } from "../utils/SuggestionErrors";

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * YYYY-MM-DD que existe no calendário (rejeita 2025-02-30, 2025-13-01)
 */
export function isCalendarDay(day: string): boolean {
  if (!DAY_PATTERN.test(day)) return false;
  const parsed = new Date(`${day}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === day;
}

/**
 * Valida um vetor de métricas de usuário (9 valores finitos, na ordem de METRIC_KEYS)
 */
export function assertMetricVector(metrics: readonly number[], context = "metric vector"): MetricVector {
  if (metrics.length !== METRIC_COUNT) {
    throw new DimensionMismatchError(METRIC_COUNT, metrics.length, context);
  }

  metrics.forEach((value, index) => {
    if (!Number.isFinite(value)) {
      throw new ConfigInvalidError(METRIC_KEYS[index], `must be a finite number, got ${value}`);
    }
  });

  return [...metrics];
}

export function createSatisfactionEntry(
  day: string,
  metrics: readonly number[],
  score?: number | SatisfactionScore
): SatisfactionEntry {
  if (!isCalendarDay(day)) {
    throw new ConfigInvalidError("day", `expected a calendar day as YYYY-MM-DD, got "${day}"`);
  }

  let resolved: SatisfactionScore;
  if (score === undefined) {
    resolved = UNSCORED;
  } else if (typeof score === "number") {
    resolved = scored(score);
  } else {
    resolved = score;
  }

  if (resolved.kind === "SCORED" && !Number.isFinite(resolved.value)) {
    throw new ConfigInvalidError("satisfactionScore", `must be a finite number, got ${resolved.value}`);
  }

  return {
    day,
    score: resolved,
    metrics: assertMetricVector(metrics, `entry ${day}`),
  };
}

export function metricsToRecord(metrics: MetricVector): MetricRecord {
  if (metrics.length !== METRIC_COUNT) {
    throw new DimensionMismatchError(METRIC_COUNT, metrics.length, "metricsToRecord");
  }

  return {
    stepsToday: metrics[0],
    timeInBedLastNight: metrics[1],
    activeEnergyToday: metrics[2],
    exerciseMinutesToday: metrics[3],
    standHoursToday: metrics[4],
    daylightTimeToday: metrics[5],
    distanceWalkingToday: metrics[6],
    flightsClimbedToday: metrics[7],
    restingHeartRateToday: metrics[8],
  };
}

export function metricsFromRecord(record: MetricRecord): MetricVector {
  return METRIC_KEYS.map(key => record[key]);
}

/**
 * Subconjunto de treino: apenas entradas com score informado
 */
export function selectTrainingSet(entries: readonly SatisfactionEntry[]): ScoredEntry[] {
  return entries.filter(hasScore);
}

/**
 * Entrada avaliada mais recente (dias em YYYY-MM-DD ordenam lexicograficamente)
 */
export function findMostRecentScored(entries: readonly SatisfactionEntry[]): ScoredEntry | undefined {
  let latest: ScoredEntry | undefined;
  for (const entry of selectTrainingSet(entries)) {
    if (!latest || entry.day > latest.day) {
      latest = entry;
    }
  }
  return latest;
}
