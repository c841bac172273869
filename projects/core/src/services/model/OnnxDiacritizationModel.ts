import * as ort from "onnxruntime-node";
import { join } from "node:path";

import type {
  ChannelPredictions,
  IDiacritizationModel,
  PredictOptions,
  ScoreMatrix,
} from "../../interfaces/IDiacritizationModel.js";
import type { IModelManager, ModelSignature } from "../../interfaces/IModelManager.js";
import type { ILogger } from "../../interfaces/ILogger.js";
import {
  GenerationCancelledError,
  ModelLoadFailedError,
  ModelNotInitializedError,
  PredictionFailedError,
} from "../../errors/DiacritizationError.js";
import { NOOP_LOGGER } from "../../logging/index.js";
import { MASK_INDEX } from "../../alphabet/AlphabetCodec.js";
import { NAKDIMON_SIGNATURE } from "../model-manager/ModelRegistry.js";

const DEFAULT_MODEL_ID = "nakdimon";

/**
 * The part of an ONNX Runtime session this gateway uses.
 */
export interface InferenceSessionLike {
  run(feeds: Record<string, ort.Tensor>): Promise<Readonly<Record<string, ort.Tensor | undefined>>>;
  release(): Promise<void>;
}

export type InferenceSessionFactory = (modelPath: string) => Promise<InferenceSessionLike>;

export interface OnnxDiacritizationModelOptions {
  readonly modelManager: IModelManager;
  readonly modelId?: string;
  /** Overrides the registered fixed input length */
  readonly inputLength?: number;
  readonly logger?: ILogger;
  /** Replaces InferenceSession.create, e.g. to pick execution providers */
  readonly sessionFactory?: InferenceSessionFactory;
}

const createCpuSession: InferenceSessionFactory = (modelPath) =>
  ort.InferenceSession.create(modelPath, { executionProviders: ["cpu"] });

/**
 * Nakdimon diacritization model running on ONNX Runtime.
 *
 * The session is created lazily on first use and shared by every caller.
 * A failed load is remembered: the model stays unusable until the process
 * restarts, and each later call rejects with the original
 * ModelLoadFailedError.
 *
 * dispose() releases the session only after in-flight runs settle. A load
 * still pending at dispose() releases its session as soon as it arrives.
 */
export class OnnxDiacritizationModel implements IDiacritizationModel {
  private readonly modelManager: IModelManager;
  private readonly modelId: string;
  private readonly signature: ModelSignature;
  private readonly logger: ILogger;
  private readonly sessionFactory: InferenceSessionFactory;

  readonly inputLength: number;

  private session: InferenceSessionLike | null = null;
  private loading: Promise<InferenceSessionLike> | null = null;
  private disposed = false;
  private readonly runsInFlight: Set<Promise<unknown>> = new Set();

  constructor(options: Readonly<OnnxDiacritizationModelOptions>) {
    this.modelManager = options.modelManager;
    this.modelId = options.modelId ?? DEFAULT_MODEL_ID;
    this.logger = options.logger ?? NOOP_LOGGER;
    this.sessionFactory = options.sessionFactory ?? createCpuSession;

    // An unregistered id fails on first use, not here
    this.signature =
      this.modelManager.getModelInfo(this.modelId)?.signature ?? NAKDIMON_SIGNATURE;
    this.inputLength = options.inputLength ?? this.signature.inputLength;
  }

  get isReady(): boolean {
    return this.session !== null;
  }

  async initialize(): Promise<void> {
    await this.acquireSession();
  }

  async predict(
    indices: Int32Array,
    options?: Readonly<PredictOptions>
  ): Promise<ChannelPredictions> {
    if (indices.length > this.inputLength) {
      throw new PredictionFailedError(
        `input of ${indices.length} positions exceeds model length ${this.inputLength}`
      );
    }

    const session = await this.acquireSession();

    // dispose() may have run while the load settled
    if (this.disposed) {
      throw new ModelNotInitializedError("OnnxDiacritizationModel");
    }
    if (options?.signal?.aborted) {
      throw new GenerationCancelledError();
    }

    // Right-pad with MASK up to the fixed model length
    const padded = new Int32Array(this.inputLength).fill(MASK_INDEX);
    padded.set(indices);

    const feeds = {
      [this.signature.input]: new ort.Tensor("int32", padded, [1, this.inputLength]),
    };

    const run = session.run(feeds);
    this.runsInFlight.add(run);

    let results: Readonly<Record<string, ort.Tensor | undefined>>;
    try {
      results = await run;
    } catch (error) {
      this.logger.warn("Inference failed", { modelId: this.modelId, error: String(error) });
      throw new PredictionFailedError(
        error instanceof Error ? error.message : String(error),
        error
      );
    } finally {
      this.runsInFlight.delete(run);
    }

    const { outputs } = this.signature;
    return {
      niqqud: this.readScores(outputs.niqqud, results[outputs.niqqud]),
      dagesh: this.readScores(outputs.dagesh, results[outputs.dagesh]),
      sin: this.readScores(outputs.sin, results[outputs.sin]),
    };
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    const session = this.session;
    this.session = null;
    this.loading = null;
    if (session) {
      // Aborting a request does not stop a native run already in progress
      await Promise.allSettled(this.runsInFlight);
      await session.release();
    }
  }

  private acquireSession(): Promise<InferenceSessionLike> {
    if (this.disposed) {
      return Promise.reject(new ModelNotInitializedError("OnnxDiacritizationModel"));
    }
    if (!this.loading) {
      this.loading = this.loadSession();
    }
    return this.loading;
  }

  private async loadSession(): Promise<InferenceSessionLike> {
    const startedAt = Date.now();
    let session: InferenceSessionLike;
    try {
      const modelDir = await this.modelManager.ensureModel(this.modelId);
      const info = this.modelManager.getModelInfo(this.modelId);
      const file = info?.files[0]?.path ?? `${this.modelId}.onnx`;

      session = await this.sessionFactory(join(modelDir, file));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error("Model load failed", { modelId: this.modelId, reason });
      throw new ModelLoadFailedError(this.modelId, reason, error);
    }

    if (this.disposed) {
      await session.release();
      throw new ModelNotInitializedError("OnnxDiacritizationModel");
    }

    this.session = session;
    this.logger.info("Model loaded", {
      modelId: this.modelId,
      elapsedMs: Date.now() - startedAt,
    });
    return session;
  }

  private readScores(name: string, tensor: ort.Tensor | undefined): ScoreMatrix {
    if (!tensor) {
      throw new PredictionFailedError(`model output '${name}' missing`);
    }
    if (!(tensor.data instanceof Float32Array)) {
      throw new PredictionFailedError(
        `model output '${name}' has type ${tensor.type}, expected float32`
      );
    }

    // Accept [1, rows, classes] or [rows, classes]
    const dims = tensor.dims;
    const classes = dims[dims.length - 1] ?? 0;
    const rows = dims[dims.length - 2] ?? 0;
    const batch = dims.length === 3 ? dims[0] : 1;

    if (
      dims.length < 2 ||
      dims.length > 3 ||
      batch !== 1 ||
      rows !== this.inputLength ||
      classes < 1 ||
      tensor.data.length !== rows * classes
    ) {
      throw new PredictionFailedError(
        `model output '${name}' has unexpected shape [${dims.join(", ")}]`
      );
    }

    return { data: tensor.data, rows, classes };
  }
}

export function createOnnxDiacritizationModel(
  options: Readonly<OnnxDiacritizationModelOptions>
): OnnxDiacritizationModel {
  return new OnnxDiacritizationModel(options);
}
