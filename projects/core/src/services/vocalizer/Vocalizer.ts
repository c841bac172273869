import type {
  ChannelPredictions,
  IDiacritizationModel,
} from "../../interfaces/IDiacritizationModel.js";
import type { ILogger } from "../../interfaces/ILogger.js";
import { AlphabetCodec } from "../../alphabet/AlphabetCodec.js";
import { Decoder } from "../decoder/Decoder.js";
import { splitByLength, joinSegments, type Segment } from "../segmenter/Segmenter.js";
import {
  GenerationCancelledError,
  isCancellation,
} from "../../errors/DiacritizationError.js";
import { NOOP_LOGGER } from "../../logging/index.js";

export interface VocalizerOptions {
  readonly model: IDiacritizationModel;
  readonly codec?: AlphabetCodec;
  /**
   * Segment length bound. Defaults to the model's input length, so every
   * segment fits one prediction.
   */
  readonly maxLength?: number;
  readonly logger?: ILogger;
}

export interface VocalizeOptions {
  /** Checked between segments; aborting discards all output */
  readonly signal?: AbortSignal;
  /** Included in cancellation errors and log lines */
  readonly requestId?: number;
}

export interface VocalizerDiagnostics {
  readonly segmentsProcessed: number;
  readonly predictionsRun: number;
  readonly cancellations: number;
}

/**
 * Runs text through segmenter, codec, model and decoder.
 *
 * Input is expected without diacritics; callers strip them first.
 */
export class Vocalizer {
  private readonly model: IDiacritizationModel;
  private readonly codec: AlphabetCodec;
  private readonly decoder: Decoder;
  private readonly maxLength: number;
  private readonly logger: ILogger;

  private segmentsProcessed = 0;
  private predictionsRun = 0;
  private cancellations = 0;

  constructor(options: Readonly<VocalizerOptions>) {
    this.model = options.model;
    this.codec = options.codec ?? new AlphabetCodec();
    this.decoder = new Decoder(this.codec);
    this.maxLength = Math.min(
      options.maxLength ?? this.model.inputLength,
      this.model.inputLength
    );
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  /**
   * @throws {GenerationCancelledError} When the signal aborts mid-run
   * @throws {PredictionFailedError} When the model fails
   */
  async vocalize(text: string, options?: Readonly<VocalizeOptions>): Promise<string> {
    const signal = options?.signal;
    const requestId = options?.requestId;
    const segments = splitByLength(text, this.maxLength);
    const outputs: Segment[] = [];

    this.logger.debug("Vocalizing", { requestId, segments: segments.length });

    for (const segment of segments) {
      this.throwIfAborted(signal, requestId);

      const { letters, indices } = this.codec.encodeText(segment.text);
      if (indices.length === 0) {
        outputs.push({ text: "", cut: segment.cut });
        continue;
      }

      let predictions: ChannelPredictions;
      try {
        predictions = await this.model.predict(indices, { signal });
      } catch (error) {
        if (isCancellation(error)) {
          this.cancellations++;
        }
        throw error;
      }
      this.predictionsRun++;
      this.throwIfAborted(signal, requestId);

      outputs.push({
        text: this.decoder.merge({
          letters,
          indices,
          length: indices.length,
          ...predictions,
        }),
        cut: segment.cut,
      });
      this.segmentsProcessed++;
    }

    return joinSegments(outputs);
  }

  getDiagnostics(): VocalizerDiagnostics {
    return {
      segmentsProcessed: this.segmentsProcessed,
      predictionsRun: this.predictionsRun,
      cancellations: this.cancellations,
    };
  }

  private throwIfAborted(signal: AbortSignal | undefined, requestId?: number): void {
    if (signal?.aborted) {
      this.cancellations++;
      throw new GenerationCancelledError(requestId);
    }
  }
}

export function createVocalizer(options: Readonly<VocalizerOptions>): Vocalizer {
  return new Vocalizer(options);
}
