export type ModelFormat = "onnx";

export interface ModelFileInfo {
  readonly path: string;
  readonly sizeBytes?: number;
}

/**
 * Tensor names and fixed input length of a diacritization model.
 */
export interface ModelSignature {
  readonly input: string;
  readonly outputs: {
    readonly niqqud: string;
    readonly dagesh: string;
    readonly sin: string;
  };
  readonly inputLength: number;
}

export interface ModelInfo {
  readonly id: string;
  readonly name: string;
  readonly format: ModelFormat;
  /** Where the artifact came from, for documentation only */
  readonly source: string;
  readonly files: readonly ModelFileInfo[];
  readonly signature: ModelSignature;
}

export interface IModelManager {
  isModelCached(modelId: string): Promise<boolean>;
  getModelPath(modelId: string): Promise<string | undefined>;
  /**
   * Returns the directory holding every file of the model.
   * @throws {ModelNotFoundError} When the model is unknown or incomplete
   */
  ensureModel(modelId: string): Promise<string>;
  getModelInfo(modelId: string): ModelInfo | undefined;
  listModels(): readonly ModelInfo[];
  listCachedModels(): Promise<readonly string[]>;
}
