/**
 * Suggestion Module Index
 *
 * Exporta o motor de sugestões: tipos, modelo (scaler + k-NN), otimizador,
 * serviço e utilitários.
 *
 * @version 1.0.0
 */

// Tipos
export * from "./types/suggestion.types";

// Configuração
export {
  suggestionConfigSchema,
  objectiveSourceSchema,
  DEFAULT_SUGGESTION_CONFIG,
  resolveSuggestionConfig,
  mergeSuggestionConfig,
  effectiveRestarts,
  loadSuggestionConfigFromEnv,
  type SuggestionConfig,
  type SuggestionConfigInput,
} from "./config/suggestion.config";

// Modelo
export { euclideanDistance } from "./model/DistanceMetric";
export { FeatureScaler, type ScalerBounds } from "./model/FeatureScaler";
export {
  KNNRegressor,
  DEFAULT_NEIGHBORS,
  DEFAULT_EPSILON,
  type KNNRegressorOptions,
  type TrainingPoint,
} from "./model/KNNRegressor";
export {
  assertMetricVector,
  createSatisfactionEntry,
  metricsToRecord,
  metricsFromRecord,
  selectTrainingSet,
  findMostRecentScored,
} from "./model/SatisfactionEntries";

// Otimizador
export {
  AnnealingOptimizer,
  computeObservedBounds,
  clampToBounds,
  type ObservedBounds,
} from "./optimizer/AnnealingOptimizer";

// Dados
export {
  parseEntryDataset,
  loadEntryDatasetFile,
  entryDatasetSchema,
  type DatasetEntry,
  type EntryDataset,
} from "./data/entryDataset";

// Serviço
export { InMemoryEntryRepository, type EntryRepository } from "./service/EntryRepository";
export { computeMetricDeltas } from "./service/metricDeltas";
export {
  SuggestionService,
  type Suggestion,
  type SuggestionOutcome,
  type SuggestRequest,
  type SuggestionServiceOptions,
  type RandomSourceFactory,
} from "./service/SuggestionService";
export { suggestionRouter } from "./suggestionRouter";

// Utilitários
export {
  SeededRNG,
  Mulberry32RNG,
  XorShift128PlusRNG,
  createSeededRNG,
  seedFromString,
  seedFromTimestamp,
  type IRNG,
  type RNGConfig,
  type RNGAlgorithm,
  type RandomSource,
} from "./utils/SeededRNG";
export {
  SuggestionError,
  UnfittedModelError,
  DimensionMismatchError,
  MissingScoreError,
  EmptyTrainingSetError,
  ConfigInvalidError,
  EntryNotFoundError,
  SUGGESTION_ERROR_CODES,
  handleSuggestionError,
  type SuggestionErrorCode,
  type SuggestionErrorResponse,
} from "./utils/SuggestionErrors";
export {
  SuggestionLogger,
  modelLogger,
  optimizerLogger,
  serviceLogger,
  setGlobalLogLevel,
  enableSilentMode,
  resolveLogLevel,
  type LogLevel,
  type LoggerConfig,
} from "./utils/SuggestionLogger";
