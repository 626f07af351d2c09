/**
 * AnnealingOptimizer - Busca de Métricas por Simulated Annealing
 *
 * Procura, perto do ponto de partida, um vetor de métricas cujo score
 * PREDITO pelo KNNRegressor supere o valor inicial.
 *
 * Fluxo por iteração:
 * 1. Sorteia UMA dimensão e um passo em U(-stepSize, stepSize), em unidades escaladas
 * 2. Converte o passo pela amplitude da dimensão; as demais ficam intactas
 * 3. Aplica clamp nos limites observados
 * 4. Avalia o candidato com o regressor
 * 5. Critério de Metropolis: aceita se delta > 0, senão com prob. exp(delta / T)
 * 6. Resfria: T = max(T * coolingRate, minTemperature)
 *
 * Restarts: o restart 0 parte da entrada do chamador; os demais partem de uma
 * entrada avaliada sorteada. O melhor global e os históricos concatenados
 * são devolvidos.
 *
 * POLÍTICA: qualquer erro de predição aborta a execução inteira. Não existe
 * resultado parcial.
 *
 * @version 1.0.0
 */

import {
  type Candidate,
  type CandidateOrigin,
  type MetricVector,
  type OptimizationResult,
  type RestartSummary,
  type SatisfactionEntry,
  type ScoredEntry,
  isScored,
  scored,
} from "../types/suggestion.types";
import {
  type SuggestionConfig,
  type SuggestionConfigInput,
  effectiveRestarts,
  resolveSuggestionConfig,
} from "../config/suggestion.config";
import { FeatureScaler } from "../model/FeatureScaler";
import { KNNRegressor } from "../model/KNNRegressor";
import { selectTrainingSet } from "../model/SatisfactionEntries";
import { type RandomSource, createSeededRNG, seedFromTimestamp } from "../utils/SeededRNG";
import {
  ConfigInvalidError,
  DimensionMismatchError,
  EmptyTrainingSetError,
  MissingScoreError,
} from "../utils/SuggestionErrors";
import { optimizerLogger } from "../utils/SuggestionLogger";

// ============================================================================
// OBSERVED BOUNDS
// ============================================================================

/**
 * Limites realistas por dimensão, calculados sobre TODAS as entradas
 * (com ou sem score)
 */
export interface ObservedBounds {
  mins: readonly number[];
  maxs: readonly number[];
}

export function computeObservedBounds(entries: readonly SatisfactionEntry[]): ObservedBounds | null {
  if (entries.length === 0) return null;

  const dimension = entries[0].metrics.length;
  const mins = new Array<number>(dimension).fill(Number.POSITIVE_INFINITY);
  const maxs = new Array<number>(dimension).fill(Number.NEGATIVE_INFINITY);

  for (const entry of entries) {
    if (entry.metrics.length !== dimension) {
      throw new DimensionMismatchError(dimension, entry.metrics.length, `observed bounds (${entry.day})`);
    }
    entry.metrics.forEach((value, i) => {
      if (value < mins[i]) mins[i] = value;
      if (value > maxs[i]) maxs[i] = value;
    });
  }

  return { mins, maxs };
}

/**
 * Restringe cada dimensão a [min, max]. Sem limites, devolve cópia inalterada.
 */
export function clampToBounds(vector: MetricVector, bounds: ObservedBounds | null): number[] {
  if (!bounds) return [...vector];

  if (vector.length !== bounds.mins.length) {
    throw new DimensionMismatchError(bounds.mins.length, vector.length, "clampToBounds");
  }

  return vector.map((value, i) => Math.max(bounds.mins[i], Math.min(bounds.maxs[i], value)));
}

// ============================================================================
// TYPES
// ============================================================================

interface StartingPoint {
  entry: SatisfactionEntry;
  value: number;
  origin: CandidateOrigin;
}

interface RunOutcome {
  best: Candidate;
  history: Candidate[];
  summary: RestartSummary;
}

// ============================================================================
// ANNEALING OPTIMIZER CLASS
// ============================================================================

export class AnnealingOptimizer {
  private readonly config: SuggestionConfig;
  private readonly rng: RandomSource;
  private readonly trainingSet: readonly ScoredEntry[];
  private readonly totalEntries: number;
  private readonly scaler: FeatureScaler;
  private readonly regressor: KNNRegressor;
  private readonly bounds: ObservedBounds | null;

  constructor(
    entries: readonly SatisfactionEntry[],
    config: SuggestionConfigInput = {},
    rng: RandomSource = createSeededRNG(seedFromTimestamp())
  ) {
    this.config = resolveSuggestionConfig(config);
    this.rng = rng;
    this.totalEntries = entries.length;

    // Scaler ajustado apenas sobre entradas avaliadas (mesma população do regressor)
    this.trainingSet = selectTrainingSet(entries);
    this.scaler = new FeatureScaler().fit(this.trainingSet.map(entry => entry.metrics));
    this.regressor = new KNNRegressor({ k: this.config.k }).fit(this.trainingSet, this.scaler);
    this.bounds = computeObservedBounds(entries);

    optimizerLogger.debug(
      `Inicializado: ${entries.length} entradas, ${this.trainingSet.length} avaliadas, seed=${rng.getSeed()}`,
      "AnnealingOptimizer"
    );
  }

  getConfig(): SuggestionConfig {
    return { ...this.config };
  }

  getRegressor(): KNNRegressor {
    return this.regressor;
  }

  getObservedBounds(): ObservedBounds | null {
    return this.bounds;
  }

  /**
   * Executa a busca a partir de startEntry.
   *
   * Com objective REPORTED_SCORE, startEntry precisa de score (MissingScoreError
   * antes de qualquer iteração). Com PREDICTED_SCORE o valor inicial é a
   * predição do regressor para o vetor de partida.
   */
  optimize(startEntry: SatisfactionEntry, maxIterations: number = this.config.maxIterations): OptimizationResult {
    if (this.config.objective === "REPORTED_SCORE" && !isScored(startEntry.score)) {
      throw new MissingScoreError(startEntry.day);
    }
    if (!Number.isInteger(maxIterations) || maxIterations < 0) {
      throw new ConfigInvalidError("maxIterations", `must be a non-negative integer, got ${maxIterations}`);
    }

    const startTime = Date.now();
    const restarts = effectiveRestarts(this.config.numRestarts);

    optimizerLogger.startOperation("Simulated annealing", {
      day: startEntry.day,
      iterations: maxIterations,
      restarts,
      objective: this.config.objective,
      seed: this.rng.getSeed(),
    });

    const history: Candidate[] = [];
    const summaries: RestartSummary[] = [];

    const first = this.runSingleAnnealing(this.startingPoint(startEntry), maxIterations, 0);
    const initialValue = first.summary.startValue;
    let best = first.best;
    history.push(...first.history);
    summaries.push(first.summary);

    for (let restartIndex = 1; restartIndex < restarts; restartIndex++) {
      const start = this.startingPoint(this.pickRestartEntry());
      const outcome = this.runSingleAnnealing(start, maxIterations, restartIndex);

      history.push(...outcome.history);
      summaries.push(outcome.summary);

      if (outcome.best.value > best.value) {
        best = outcome.best;
      }
    }

    const executionTimeMs = Date.now() - startTime;

    optimizerLogger.endOperation("Simulated annealing", true, {
      initialValue: initialValue.toFixed(4),
      bestValue: best.value.toFixed(4),
      accepted: history.length,
      timeMs: executionTimeMs,
    });

    return {
      bestEntry: {
        day: startEntry.day,
        score: scored(best.value),
        metrics: [...best.metrics],
      },
      bestValue: best.value,
      bestOrigin: best.origin,
      initialValue,
      history,
      restarts: summaries,
      seed: this.rng.getSeed(),
      iterations: maxIterations * restarts,
      executionTimeMs,
    };
  }

  // ==========================================================================
  // PRIVATE
  // ==========================================================================

  private startingPoint(entry: SatisfactionEntry): StartingPoint {
    if (this.config.objective === "PREDICTED_SCORE") {
      return { entry, value: this.regressor.predictRaw(entry.metrics), origin: "PREDICTED" };
    }
    if (!isScored(entry.score)) {
      throw new MissingScoreError(entry.day);
    }
    return { entry, value: entry.score.value, origin: "REPORTED" };
  }

  private pickRestartEntry(): ScoredEntry {
    if (this.trainingSet.length === 0) {
      throw new EmptyTrainingSetError(this.totalEntries);
    }
    return this.rng.randomChoice(this.trainingSet);
  }

  /**
   * Uma execução de annealing a partir de start
   */
  private runSingleAnnealing(start: StartingPoint, maxIterations: number, restartIndex: number): RunOutcome {
    const context = `restart ${restartIndex}`;
    const { initialTemperature, coolingRate, minTemperature } = this.config;

    let current: Candidate = { metrics: start.entry.metrics, value: start.value, origin: start.origin };
    let best = current;
    let temperature = Math.max(initialTemperature, minTemperature);
    const history: Candidate[] = [];

    for (let iteration = 0; iteration < maxIterations; iteration++) {
      const candidateMetrics = this.propose(current.metrics);
      const candidateValue = this.regressor.predictRaw(candidateMetrics);
      const delta = candidateValue - current.value;

      const accepted = delta > 0 || this.rng.random() < Math.exp(delta / temperature);

      if (accepted) {
        current = { metrics: candidateMetrics, value: candidateValue, origin: "PREDICTED" };
        history.push(current);

        if (current.value > best.value) {
          best = current;
        }
      }

      temperature = Math.max(temperature * coolingRate, minTemperature);

      optimizerLogger.progress(
        iteration + 1,
        maxIterations,
        `current=${current.value.toFixed(4)} best=${best.value.toFixed(4)} T=${temperature.toFixed(3)}`,
        context
      );
    }

    return {
      best,
      history,
      summary: {
        restartIndex,
        startDay: start.entry.day,
        startValue: start.value,
        bestValue: best.value,
        acceptedMoves: history.length,
        iterations: maxIterations,
      },
    };
  }

  /**
   * Gera candidato: copia o vetor corrente e move SÓ a dimensão sorteada.
   * O passo é sorteado em unidades escaladas e convertido pela amplitude do
   * scaler; dimensão constante no treino usa a amplitude observada.
   * Depois aplica clamp nos limites observados.
   */
  private propose(metrics: MetricVector): number[] {
    const { mins, maxs } = this.scaler.getBounds();
    if (metrics.length !== mins.length) {
      throw new DimensionMismatchError(mins.length, metrics.length, "AnnealingOptimizer.propose");
    }

    const candidate = [...metrics];
    const dimension = this.rng.randomInt(0, candidate.length - 1);
    const step = this.rng.randomFloat(-this.config.stepSize, this.config.stepSize);
    candidate[dimension] += step * this.stepRange(dimension, maxs[dimension] - mins[dimension]);

    return clampToBounds(candidate, this.bounds);
  }

  private stepRange(dimension: number, scalerRange: number): number {
    if (scalerRange > 0 || !this.bounds) return scalerRange;
    return this.bounds.maxs[dimension] - this.bounds.mins[dimension];
  }
}
