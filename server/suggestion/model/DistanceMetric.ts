import type { MetricVector } from "../types/suggestion.types";
import { DimensionMismatchError } from "../utils/SuggestionErrors";

/**
 * Distância euclidiana entre dois vetores de mesma dimensão
 */
export function euclideanDistance(a: MetricVector, b: MetricVector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length, "euclideanDistance");
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}
