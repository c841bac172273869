/**
 * Per-position class scores for one channel, row-major: the score of class
 * `c` at position `p` is `data[p * classes + c]`.
 */
export interface ScoreMatrix {
  readonly data: ArrayLike<number>;
  readonly rows: number;
  readonly classes: number;
}

export interface ChannelPredictions {
  readonly niqqud: ScoreMatrix;
  readonly dagesh: ScoreMatrix;
  readonly sin: ScoreMatrix;
}

export interface PredictOptions {
  /** Aborts before the model is invoked */
  readonly signal?: AbortSignal;
}

/**
 * Boundary to the pre-trained sequence labeling model.
 */
export interface IDiacritizationModel {
  /** Fixed sequence length the model accepts; shorter input is MASK-padded */
  readonly inputLength: number;
  readonly isReady: boolean;
  /** Loads the model once; concurrent callers share the same load */
  initialize(): Promise<void>;
  /**
   * Scores every position of `indices` padded to `inputLength`.
   * @throws {PredictionFailedError} On any load or inference failure
   */
  predict(
    indices: Int32Array,
    options?: Readonly<PredictOptions>
  ): Promise<ChannelPredictions>;
  dispose(): Promise<void>;
}
