/**
 * FeatureScaler - Normalização Min-Max por Dimensão
 *
 * transform:        (x - min) / (max - min), 0 quando max == min
 * inverseTransform: scaled * (max - min) + min
 *
 * Valores fora de [min, max] extrapolam linearmente (sem clamp).
 *
 * Imutável: fit() devolve um NOVO scaler e nunca altera a instância atual,
 * então vários scalers podem ser ajustados a partir do mesmo dataset.
 *
 * @version 1.0.0
 */

import type { MetricVector } from "../types/suggestion.types";
import { DimensionMismatchError, UnfittedModelError } from "../utils/SuggestionErrors";

export interface ScalerBounds {
  mins: readonly number[];
  maxs: readonly number[];
}

export class FeatureScaler {
  private readonly bounds: ScalerBounds | null;

  constructor(bounds: ScalerBounds | null = null) {
    if (bounds && bounds.mins.length !== bounds.maxs.length) {
      throw new DimensionMismatchError(bounds.mins.length, bounds.maxs.length, "FeatureScaler bounds");
    }
    this.bounds = bounds ? { mins: [...bounds.mins], maxs: [...bounds.maxs] } : null;
  }

  /**
   * Calcula min/max por dimensão. Conjunto vazio devolve scaler não ajustado.
   */
  fit(vectors: readonly MetricVector[]): FeatureScaler {
    if (vectors.length === 0) {
      return new FeatureScaler();
    }

    const dimension = vectors[0].length;
    const mins = new Array<number>(dimension).fill(Number.POSITIVE_INFINITY);
    const maxs = new Array<number>(dimension).fill(Number.NEGATIVE_INFINITY);

    for (const vector of vectors) {
      if (vector.length !== dimension) {
        throw new DimensionMismatchError(dimension, vector.length, "FeatureScaler.fit");
      }
      for (let i = 0; i < dimension; i++) {
        if (vector[i] < mins[i]) mins[i] = vector[i];
        if (vector[i] > maxs[i]) maxs[i] = vector[i];
      }
    }

    return new FeatureScaler({ mins, maxs });
  }

  get isFitted(): boolean {
    return this.bounds !== null;
  }

  /** Dimensão ajustada (0 quando não ajustado) */
  get dimension(): number {
    return this.bounds ? this.bounds.mins.length : 0;
  }

  getBounds(): ScalerBounds {
    return this.requireBounds(this.dimension);
  }

  transform(vector: MetricVector): number[] {
    const { mins, maxs } = this.requireBounds(vector.length);

    return vector.map((value, i) => {
      const range = maxs[i] - mins[i];
      return range > 0 ? (value - mins[i]) / range : 0;
    });
  }

  inverseTransform(scaled: MetricVector): number[] {
    const { mins, maxs } = this.requireBounds(scaled.length);

    return scaled.map((value, i) => value * (maxs[i] - mins[i]) + mins[i]);
  }

  private requireBounds(length: number): ScalerBounds {
    if (!this.bounds) {
      throw new UnfittedModelError("FeatureScaler");
    }
    if (length !== this.bounds.mins.length) {
      throw new DimensionMismatchError(this.bounds.mins.length, length, "FeatureScaler");
    }
    return this.bounds;
  }
}
