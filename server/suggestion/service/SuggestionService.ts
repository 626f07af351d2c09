/**
 * SuggestionService - Orquestra o Motor de Sugestões
 *
 * Para cada chamada:
 * 1. Carrega um snapshot das entradas do repositório
 * 2. Escolhe o ponto de partida (dia pedido ou o dia avaliado mais recente)
 * 3. Constrói scaler, regressor e otimizador do zero (nada é reaproveitado
 *    entre chamadas)
 * 4. Devolve a sugestão com os deltas por métrica
 *
 * Erros de domínio (SuggestionError) viram { status: "UNAVAILABLE" } para a
 * interface exibir "sem sugestão disponível". Demais erros propagam.
 *
 * @version 1.0.0
 */

import type {
  Candidate,
  MetricDelta,
  OptimizationResult,
  SatisfactionEntry,
} from "../types/suggestion.types";
import {
  type SuggestionConfig,
  type SuggestionConfigInput,
  mergeSuggestionConfig,
  resolveSuggestionConfig,
} from "../config/suggestion.config";
import { FeatureScaler } from "../model/FeatureScaler";
import { KNNRegressor } from "../model/KNNRegressor";
import { AnnealingOptimizer } from "../optimizer/AnnealingOptimizer";
import { assertMetricVector, findMostRecentScored, selectTrainingSet } from "../model/SatisfactionEntries";
import { type RandomSource, createSeededRNG, seedFromTimestamp } from "../utils/SeededRNG";
import {
  EmptyTrainingSetError,
  EntryNotFoundError,
  SuggestionError,
  type SuggestionErrorCode,
} from "../utils/SuggestionErrors";
import { serviceLogger } from "../utils/SuggestionLogger";
import type { EntryRepository } from "./EntryRepository";
import { computeMetricDeltas } from "./metricDeltas";

// ============================================================================
// TYPES
// ============================================================================

export interface SuggestRequest {
  /** Dia de partida (YYYY-MM-DD); padrão: último dia avaliado */
  day?: string;
  /** Seed do RNG para execuções reproduzíveis */
  seed?: number;
  /** Sobrescreve a configuração base do serviço */
  config?: SuggestionConfigInput;
}

export interface Suggestion {
  current: SatisfactionEntry;
  best: SatisfactionEntry;
  initialValue: number;
  bestValue: number;
  improvement: number;
  deltas: MetricDelta[];
  history: Candidate[];
  seed: number;
  trainingSize: number;
}

export type SuggestionOutcome =
  | { status: "AVAILABLE"; suggestion: Suggestion }
  | { status: "UNAVAILABLE"; code: SuggestionErrorCode; message: string };

export type RandomSourceFactory = (seed: number) => RandomSource;

export interface SuggestionServiceOptions {
  config?: SuggestionConfigInput;
  createRandomSource?: RandomSourceFactory;
}

// ============================================================================
// SERVICE
// ============================================================================

export class SuggestionService {
  private readonly baseConfig: SuggestionConfig;
  private readonly createRandomSource: RandomSourceFactory;

  constructor(
    private readonly repository: EntryRepository,
    options: SuggestionServiceOptions = {}
  ) {
    this.baseConfig = resolveSuggestionConfig(options.config);
    this.createRandomSource = options.createRandomSource ?? (seed => createSeededRNG(seed));
  }

  getConfig(): SuggestionConfig {
    return { ...this.baseConfig };
  }

  async suggest(request: SuggestRequest = {}): Promise<SuggestionOutcome> {
    try {
      const suggestion = await this.buildSuggestion(request);
      return { status: "AVAILABLE", suggestion };
    } catch (error) {
      if (error instanceof SuggestionError) {
        serviceLogger.warn(`Sugestão indisponível: ${error.message}`, "SuggestionService");
        return { status: "UNAVAILABLE", code: error.code, message: error.message };
      }
      throw error;
    }
  }

  /**
   * Score predito para um vetor em unidades originais, contra o snapshot atual
   */
  async predict(metrics: readonly number[]): Promise<number> {
    const vector = assertMetricVector(metrics, "predict");
    const training = selectTrainingSet(await this.repository.listEntries());
    const scaler = new FeatureScaler().fit(training.map(entry => entry.metrics));
    const regressor = new KNNRegressor({ k: this.baseConfig.k }).fit(training, scaler);
    return regressor.predictRaw(vector);
  }

  private async buildSuggestion(request: SuggestRequest): Promise<Suggestion> {
    const config = mergeSuggestionConfig(this.baseConfig, request.config);
    const entries = await this.repository.listEntries();
    const trainingSize = selectTrainingSet(entries).length;

    if (trainingSize === 0) {
      throw new EmptyTrainingSetError(entries.length);
    }

    const start = await this.resolveStartingEntry(entries, request.day);
    const seed = request.seed ?? seedFromTimestamp();
    const optimizer = this.createOptimizer(entries, config, seed);

    const result: OptimizationResult = optimizer.optimize(start, config.maxIterations);

    serviceLogger.info(
      `Sugestão para ${start.day}: ${result.initialValue.toFixed(2)} -> ${result.bestValue.toFixed(2)}`,
      "SuggestionService"
    );

    return {
      current: start,
      best: result.bestEntry,
      initialValue: result.initialValue,
      bestValue: result.bestValue,
      improvement: result.bestValue - result.initialValue,
      deltas: computeMetricDeltas(start.metrics, result.bestEntry.metrics),
      history: result.history,
      seed: result.seed,
      trainingSize,
    };
  }

  private async resolveStartingEntry(entries: readonly SatisfactionEntry[], day?: string): Promise<SatisfactionEntry> {
    if (day) {
      const entry = await this.repository.findByDay(day);
      if (!entry) {
        throw new EntryNotFoundError(day);
      }
      return entry;
    }

    const latest = findMostRecentScored(entries);
    if (!latest) {
      throw new EmptyTrainingSetError(entries.length);
    }
    return latest;
  }

  private createOptimizer(
    entries: readonly SatisfactionEntry[],
    config: SuggestionConfig,
    seed: number
  ): AnnealingOptimizer {
    return new AnnealingOptimizer(entries, config, this.createRandomSource(seed));
  }
}

