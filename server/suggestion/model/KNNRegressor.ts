/**
 * KNNRegressor - Regressão k-NN com Ponderação pelo Inverso da Distância
 *
 * Estima o score de satisfação de um vetor de métricas a partir dos k pontos
 * de treino mais próximos no espaço escalado:
 *
 *   peso(d) = 1 / (d + ε)
 *   predição = Σ peso·score / Σ peso
 *
 * O ε mantém a média finita quando a consulta coincide com um ponto de treino.
 * A predição é sempre uma média convexa dos scores de treino, portanto nunca
 * extrapola além do intervalo observado.
 *
 * Imutável: fit() devolve um NOVO regressor ajustado.
 *
 * @version 1.0.0
 */

import type { MetricVector, SatisfactionEntry } from "../types/suggestion.types";
import { hasScore } from "../types/suggestion.types";
import { DimensionMismatchError, ConfigInvalidError, UnfittedModelError } from "../utils/SuggestionErrors";
import { modelLogger } from "../utils/SuggestionLogger";
import { euclideanDistance } from "./DistanceMetric";
import type { FeatureScaler } from "./FeatureScaler";

// ============================================================================
// TYPES
// ============================================================================

export interface KNNRegressorOptions {
  /** Número de vizinhos (padrão 5) */
  k?: number;
  /** Constante somada à distância antes de inverter (padrão 1e-8) */
  epsilon?: number;
}

export interface TrainingPoint {
  scaled: readonly number[];
  score: number;
}

export interface FittedState {
  scaler: FeatureScaler;
  points: readonly TrainingPoint[];
}

interface Neighbor {
  distance: number;
  score: number;
}

export const DEFAULT_NEIGHBORS = 5;
export const DEFAULT_EPSILON = 1e-8;

// ============================================================================
// KNN REGRESSOR CLASS
// ============================================================================

export class KNNRegressor {
  readonly k: number;
  readonly epsilon: number;
  private readonly state: FittedState | null;

  constructor(options: KNNRegressorOptions = {}, state: FittedState | null = null) {
    const k = options.k ?? DEFAULT_NEIGHBORS;
    const epsilon = options.epsilon ?? DEFAULT_EPSILON;

    if (!Number.isInteger(k) || k < 1) {
      throw new ConfigInvalidError("k", `must be a positive integer, got ${k}`);
    }
    if (!(epsilon > 0)) {
      throw new ConfigInvalidError("epsilon", `must be positive, got ${epsilon}`);
    }

    this.k = k;
    this.epsilon = epsilon;
    this.state = state;
  }

  /**
   * Ajusta sobre as entradas com score. O scaler deve ter sido ajustado sobre
   * a mesma população. Sem entradas avaliadas, devolve regressor não ajustado.
   */
  fit(entries: readonly SatisfactionEntry[], scaler: FeatureScaler): KNNRegressor {
    const scoredEntries = entries.filter(hasScore);
    const options = { k: this.k, epsilon: this.epsilon };

    if (scoredEntries.length === 0) {
      modelLogger.warn(`Nenhuma entrada avaliada entre ${entries.length}; regressor permanece não ajustado`, "KNNRegressor");
      return new KNNRegressor(options);
    }

    if (!scaler.isFitted) {
      throw new UnfittedModelError("FeatureScaler");
    }

    const points: TrainingPoint[] = scoredEntries.map(entry => ({
      scaled: scaler.transform(entry.metrics),
      score: entry.score.value,
    }));

    modelLogger.debug(
      `Ajustado com ${points.length} pontos (${entries.length - points.length} sem score ignorados), k=${this.k}`,
      "KNNRegressor"
    );

    return new KNNRegressor(options, { scaler, points });
  }

  get isFitted(): boolean {
    return this.state !== null;
  }

  /** Número de pontos de treino armazenados */
  get size(): number {
    return this.state ? this.state.points.length : 0;
  }

  /**
   * Prediz o score para uma consulta já no espaço escalado
   */
  predict(scaledQuery: MetricVector): number {
    const { points } = this.requireState();
    const dimension = points[0].scaled.length;

    if (scaledQuery.length !== dimension) {
      throw new DimensionMismatchError(dimension, scaledQuery.length, "KNNRegressor.predict");
    }

    const neighbors: Neighbor[] = points.map(point => ({
      distance: euclideanDistance(scaledQuery, point.scaled),
      score: point.score,
    }));

    // sort estável: empates preservam a ordem de entrada
    neighbors.sort((a, b) => a.distance - b.distance);

    return this.weightedAverage(neighbors.slice(0, this.k));
  }

  /**
   * Prediz o score para um vetor em unidades originais
   */
  predictRaw(rawQuery: MetricVector): number {
    const { scaler } = this.requireState();
    return this.predict(scaler.transform(rawQuery));
  }

  private weightedAverage(neighbors: readonly Neighbor[]): number {
    let weightedSum = 0;
    let totalWeight = 0;

    for (const neighbor of neighbors) {
      const weight = 1 / (neighbor.distance + this.epsilon);
      weightedSum += weight * neighbor.score;
      totalWeight += weight;
    }

    return weightedSum / totalWeight;
  }

  private requireState(): FittedState {
    if (!this.state) {
      throw new UnfittedModelError("KNNRegressor");
    }
    return this.state;
  }
}
