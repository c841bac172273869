/**
 * Error codes for diacritization errors.
 * Using unique string codes for programmatic identification.
 */
export const DiacritizationErrorCode = {
  NOT_INITIALIZED: "NIQQUD_001",
  PREDICTION_FAILED: "NIQQUD_002",
  MODEL_LOAD_FAILED: "NIQQUD_003",
  CANCELLED: "NIQQUD_004",
  MODEL_NOT_FOUND: "NIQQUD_005",
  INVALID_CONFIG: "NIQQUD_006",
} as const;

export type DiacritizationErrorCodeType =
  (typeof DiacritizationErrorCode)[keyof typeof DiacritizationErrorCode];

/**
 * Base error class for diacritization errors.
 * Provides typed error codes for programmatic identification.
 */
export class DiacritizationError extends Error {
  readonly code: DiacritizationErrorCodeType;

  constructor(
    code: DiacritizationErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.code = code;
    this.name = "DiacritizationError";
  }
}

/**
 * Error thrown when a model is used after it has been disposed.
 */
export class ModelNotInitializedError extends DiacritizationError {
  constructor(serviceName: string) {
    super(
      DiacritizationErrorCode.NOT_INITIALIZED,
      `${serviceName} has been disposed`,
      { serviceName }
    );
    this.name = "ModelNotInitializedError";
  }
}

/**
 * Error thrown when the model cannot produce a prediction.
 * This is the only failure kind surfaced to generation observers.
 */
export class PredictionFailedError extends DiacritizationError {
  constructor(
    public readonly reason: string,
    cause?: unknown,
    code: DiacritizationErrorCodeType = DiacritizationErrorCode.PREDICTION_FAILED
  ) {
    super(code, `Prediction failed: ${reason}`, {
      reason,
      cause: describeCause(cause),
    });
    this.name = "PredictionFailedError";
  }
}

/**
 * Error thrown when the model artifact cannot be loaded.
 * Sticky: every later prediction on the same model fails with it.
 */
export class ModelLoadFailedError extends PredictionFailedError {
  constructor(
    public readonly modelId: string,
    reason: string,
    cause?: unknown
  ) {
    super(
      `model ${modelId} could not be loaded: ${reason}`,
      cause,
      DiacritizationErrorCode.MODEL_LOAD_FAILED
    );
    this.name = "ModelLoadFailedError";
  }
}

/**
 * Error thrown when a vocalization run is aborted through its signal.
 */
export class GenerationCancelledError extends DiacritizationError {
  constructor(requestId?: number) {
    super(
      DiacritizationErrorCode.CANCELLED,
      requestId === undefined
        ? "Generation was cancelled"
        : `Generation ${requestId} was cancelled`,
      { requestId }
    );
    this.name = "GenerationCancelledError";
  }
}

/**
 * Error thrown when a model is unknown or its artifact is missing.
 */
export class ModelNotFoundError extends DiacritizationError {
  constructor(
    public readonly modelId: string,
    reason: string
  ) {
    super(
      DiacritizationErrorCode.MODEL_NOT_FOUND,
      `Model ${modelId} not found: ${reason}`,
      { modelId, reason }
    );
    this.name = "ModelNotFoundError";
  }
}

/**
 * Error thrown when configuration or bundled tables fail validation.
 */
export class InvalidConfigError extends DiacritizationError {
  constructor(
    public readonly source: string,
    public readonly issues: readonly string[]
  ) {
    super(
      DiacritizationErrorCode.INVALID_CONFIG,
      `Invalid ${source}: ${issues.join("; ")}`,
      { source, issues }
    );
    this.name = "InvalidConfigError";
  }
}

/**
 * Type guard for cancellation errors.
 */
export function isCancellation(error: unknown): error is GenerationCancelledError {
  return error instanceof GenerationCancelledError;
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) {
    return undefined;
  }
  return cause instanceof Error ? cause.message : String(cause);
}
