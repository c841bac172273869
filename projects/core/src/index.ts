/**
 * Hebrew niqqud restoration: public API.
 */

// Alphabet
export {
  AlphabetCodec,
  createAlphabetCodec,
  MASK_INDEX,
  CHANNELS,
  FIRST_EMITTING_CLASS,
  NAKDIMON_TABLES,
  parseAlphabetTables,
  stripDiacritics,
  hasDiacritics,
  isHebrewMark,
  type AlphabetTables,
  type AlphabetTablesInput,
  type Channel,
  type EncodedText,
} from "./alphabet/index.js";

// Pipeline stages
export {
  splitByLength,
  joinSegments,
  type Segment,
  type SegmentCut,
} from "./services/segmenter/index.js";
export { Decoder, createDecoder, argmax, type MergeInput } from "./services/decoder/index.js";
export {
  Vocalizer,
  createVocalizer,
  type VocalizerOptions,
  type VocalizeOptions,
  type VocalizerDiagnostics,
} from "./services/vocalizer/index.js";

// Model
export {
  OnnxDiacritizationModel,
  createOnnxDiacritizationModel,
  type OnnxDiacritizationModelOptions,
  type InferenceSessionFactory,
  type InferenceSessionLike,
} from "./services/model/index.js";
export { ModelManager, createModelManager } from "./services/model-manager/ModelManager.js";
export {
  getModelInfo,
  listModels,
  isModelRegistered,
  NAKDIMON_INPUT_LENGTH,
  NAKDIMON_SIGNATURE,
} from "./services/model-manager/ModelRegistry.js";

// Controller
export {
  NiqqudGenerator,
  createNiqqudGenerator,
  createNiqqudRuntime,
  type GenerationState,
  type GenerationRequest,
  type GenerationResult,
  type GeneratorSnapshot,
  type NiqqudGeneratorOptions,
  type NiqqudRuntime,
  type NiqqudRuntimeOptions,
  type ResultListener,
  type SnapshotListener,
} from "./services/generator/index.js";

// Configuration and logging
export {
  DEFAULT_GENERATOR_CONFIG,
  loadConfigFromEnv,
  resolveGeneratorConfig,
  type GeneratorConfig,
} from "./config/index.js";
export { NOOP_LOGGER, createConsoleLogger } from "./logging/index.js";

// Interfaces
export type {
  IDiacritizationModel,
  ChannelPredictions,
  ScoreMatrix,
  PredictOptions,
} from "./interfaces/IDiacritizationModel.js";
export type {
  IModelManager,
  ModelInfo,
  ModelFileInfo,
  ModelFormat,
  ModelSignature,
} from "./interfaces/IModelManager.js";
export type { ILogger, LogContext } from "./interfaces/ILogger.js";

// Errors
export {
  DiacritizationError,
  DiacritizationErrorCode,
  ModelNotInitializedError,
  PredictionFailedError,
  ModelLoadFailedError,
  GenerationCancelledError,
  ModelNotFoundError,
  InvalidConfigError,
  isCancellation,
  type DiacritizationErrorCodeType,
} from "./errors/DiacritizationError.js";
