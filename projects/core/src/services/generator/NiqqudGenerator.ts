import type { ILogger } from "../../interfaces/ILogger.js";
import type { Vocalizer } from "../vocalizer/Vocalizer.js";
import { stripDiacritics } from "../../alphabet/diacritics.js";
import {
  PredictionFailedError,
  isCancellation,
} from "../../errors/DiacritizationError.js";
import { NOOP_LOGGER } from "../../logging/index.js";
import { DEFAULT_GENERATOR_CONFIG } from "../../config/GeneratorConfig.js";

/**
 * Generator state. Cancelling returns to "idle" from any state; "completed"
 * and "failed" behave like "idle" for the next generate() call.
 */
export type GenerationState = "idle" | "debouncing" | "running" | "completed" | "failed";

export interface GenerationRequest {
  readonly id: number;
  readonly sourceText: string;
  /** sourceText without diacritics */
  readonly normalizedText: string;
}

export type GenerationResult =
  | { readonly requestId: number; readonly ok: true; readonly text: string }
  | { readonly requestId: number; readonly ok: false; readonly error: PredictionFailedError };

export interface GeneratorSnapshot {
  readonly state: GenerationState;
  readonly output: string;
  readonly isGenerating: boolean;
  readonly error: PredictionFailedError | null;
  readonly requestId: number | null;
}

export type SnapshotListener = (snapshot: GeneratorSnapshot) => void;
export type ResultListener = (result: GenerationResult) => void;

export interface NiqqudGeneratorOptions {
  readonly vocalizer: Vocalizer;
  readonly debounceMs?: number;
  readonly logger?: ILogger;
}

/** The model expects every word, the last one included, to be terminated. */
const WORD_TERMINATOR = " ";
// Horizontal whitespace only; line breaks are kept
const EDGE_BLANKS = /^[^\S\r\n]+|[^\S\r\n]+$/g;

/**
 * Debounced, cancellable front end to the vocalizer.
 *
 * Each generate() call supersedes all earlier work: the pending timer is
 * cleared and the in-flight run is aborted through its AbortSignal, so a
 * superseded request never publishes a result.
 *
 * Usage:
 * ```typescript
 * const { generator } = createNiqqudRuntime({ modelsDir });
 * generator.subscribe(({ output }) => render(output));
 * generator.generate("שלום עולם");
 * ```
 */
export class NiqqudGenerator {
  private readonly vocalizer: Vocalizer;
  private readonly debounceMs: number;
  private readonly logger: ILogger;

  private currentState: GenerationState = "idle";
  private currentOutput = "";
  private generating = false;
  private currentError: PredictionFailedError | null = null;
  private request: GenerationRequest | null = null;
  private nextRequestId = 1;

  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private abortController: AbortController | null = null;

  private readonly snapshotListeners: Set<SnapshotListener> = new Set();
  private readonly resultListeners: Set<ResultListener> = new Set();

  constructor(options: Readonly<NiqqudGeneratorOptions>) {
    this.vocalizer = options.vocalizer;
    this.debounceMs = options.debounceMs ?? DEFAULT_GENERATOR_CONFIG.debounceMs;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  get state(): GenerationState {
    return this.currentState;
  }

  /** Latest vocalized text; empty until the first success */
  get output(): string {
    return this.currentOutput;
  }

  get isGenerating(): boolean {
    return this.generating;
  }

  get error(): PredictionFailedError | null {
    return this.currentError;
  }

  get latestRequest(): GenerationRequest | null {
    return this.request;
  }

  /**
   * Schedules vocalization of `text` after the debounce interval.
   * Empty text completes immediately without touching the model.
   */
  generate(text: string): void {
    this.abortPending();

    const request = this.createRequest(text);
    this.request = request;

    if (text.length === 0) {
      this.currentOutput = "";
      this.currentError = null;
      this.generating = false;
      this.currentState = "completed";
      this.notify();
      this.publish({ requestId: request.id, ok: true, text: "" });
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.generating = false;
    this.currentState = "debouncing";
    this.logger.debug("Generation scheduled", {
      requestId: request.id,
      debounceMs: this.debounceMs,
    });
    this.notify();

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      void this.run(request, controller.signal);
    }, this.debounceMs);
  }

  /**
   * Drops the pending timer and in-flight run without publishing anything.
   */
  cancel(): void {
    const hadWork = this.abortPending();
    if (hadWork) {
      this.logger.debug("Generation cancelled", { requestId: this.request?.id });
    }
    this.generating = false;
    this.currentState = "idle";
    this.notify();
  }

  /**
   * Calls `listener` with a snapshot after every change.
   * @returns Function removing the listener
   */
  subscribe(listener: SnapshotListener): () => void {
    this.snapshotListeners.add(listener);
    return () => {
      this.snapshotListeners.delete(listener);
    };
  }

  /**
   * Calls `listener` once per completed or failed request.
   * @returns Function removing the listener
   */
  onResult(listener: ResultListener): () => void {
    this.resultListeners.add(listener);
    return () => {
      this.resultListeners.delete(listener);
    };
  }

  getSnapshot(): GeneratorSnapshot {
    return {
      state: this.currentState,
      output: this.currentOutput,
      isGenerating: this.generating,
      error: this.currentError,
      requestId: this.request?.id ?? null,
    };
  }

  dispose(): void {
    this.cancel();
    this.snapshotListeners.clear();
    this.resultListeners.clear();
  }

  private createRequest(text: string): GenerationRequest {
    return Object.freeze({
      id: this.nextRequestId++,
      sourceText: text,
      normalizedText: stripDiacritics(text),
    });
  }

  private async run(request: GenerationRequest, signal: AbortSignal): Promise<void> {
    if (!this.isCurrent(request, signal)) {
      return;
    }

    this.currentState = "running";
    this.generating = true;
    this.currentError = null;
    this.notify();

    try {
      const raw = await this.vocalizer.vocalize(
        request.normalizedText + WORD_TERMINATOR,
        { signal, requestId: request.id }
      );
      if (!this.isCurrent(request, signal)) {
        return;
      }

      const text = raw.replace(EDGE_BLANKS, "");
      this.currentOutput = text;
      this.generating = false;
      this.currentState = "completed";
      this.notify();
      this.publish({ requestId: request.id, ok: true, text });
    } catch (error) {
      if (isCancellation(error) || !this.isCurrent(request, signal)) {
        this.logger.debug("Discarded superseded run", { requestId: request.id });
        return;
      }

      const failure =
        error instanceof PredictionFailedError
          ? error
          : new PredictionFailedError(
              error instanceof Error ? error.message : String(error),
              error
            );
      this.logger.warn("Generation failed", {
        requestId: request.id,
        code: failure.code,
        reason: failure.reason,
      });

      this.currentError = failure;
      this.generating = false;
      this.currentState = "failed";
      this.notify();
      this.publish({ requestId: request.id, ok: false, error: failure });
    } finally {
      if (this.abortController?.signal === signal) {
        this.abortController = null;
      }
    }
  }

  private isCurrent(request: GenerationRequest, signal: AbortSignal): boolean {
    return !signal.aborted && this.request?.id === request.id;
  }

  /**
   * Clears the debounce timer and aborts the in-flight run.
   * @returns Whether there was anything to abort
   */
  private abortPending(): boolean {
    let hadWork = false;

    if (this.debounceTimer !== null) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
      hadWork = true;
    }

    if (this.abortController) {
      this.abortController.abort();
      this.abortController = null;
      hadWork = true;
    }

    return hadWork;
  }

  private notify(): void {
    const snapshot = this.getSnapshot();
    for (const listener of this.snapshotListeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.warn("Snapshot listener threw", { error: String(error) });
      }
    }
  }

  private publish(result: GenerationResult): void {
    for (const listener of this.resultListeners) {
      try {
        listener(result);
      } catch (error) {
        this.logger.warn("Result listener threw", { error: String(error) });
      }
    }
  }
}

export function createNiqqudGenerator(
  options: Readonly<NiqqudGeneratorOptions>
): NiqqudGenerator {
  return new NiqqudGenerator(options);
}
