import type { IDiacritizationModel } from "../../interfaces/IDiacritizationModel.js";
import type { IModelManager } from "../../interfaces/IModelManager.js";
import type { ILogger } from "../../interfaces/ILogger.js";
import {
  resolveGeneratorConfig,
  type GeneratorConfig,
} from "../../config/GeneratorConfig.js";
import { NOOP_LOGGER } from "../../logging/index.js";
import { createModelManager } from "../model-manager/ModelManager.js";
import { createOnnxDiacritizationModel } from "../model/OnnxDiacritizationModel.js";
import { Vocalizer } from "../vocalizer/Vocalizer.js";
import { NiqqudGenerator } from "./NiqqudGenerator.js";

export interface NiqqudRuntimeOptions extends Partial<GeneratorConfig> {
  readonly logger?: ILogger;
  /** Injected model, e.g. a mock in tests; the ONNX model otherwise */
  readonly model?: IDiacritizationModel;
}

/**
 * Everything one application needs, wired once. The model handle is shared
 * by whatever the runtime creates and is loaded on first use.
 */
export interface NiqqudRuntime {
  readonly config: GeneratorConfig;
  readonly modelManager: IModelManager;
  readonly model: IDiacritizationModel;
  readonly vocalizer: Vocalizer;
  readonly generator: NiqqudGenerator;
  dispose(): Promise<void>;
}

/**
 * Composition root. Does not load the model: a missing or broken artifact
 * surfaces as a failed generation on first use.
 */
export function createNiqqudRuntime(options?: Readonly<NiqqudRuntimeOptions>): NiqqudRuntime {
  const { logger = NOOP_LOGGER, model: injectedModel, ...overrides } = options ?? {};
  const config = resolveGeneratorConfig(overrides);

  const modelManager = createModelManager(config.modelsDir);
  const model =
    injectedModel ??
    createOnnxDiacritizationModel({
      modelManager,
      modelId: config.modelId,
      logger,
    });
  const vocalizer = new Vocalizer({
    model,
    maxLength: config.maxLength,
    logger,
  });
  const generator = new NiqqudGenerator({
    vocalizer,
    debounceMs: config.debounceMs,
    logger,
  });

  return {
    config,
    modelManager,
    model,
    vocalizer,
    generator,
    async dispose(): Promise<void> {
      generator.dispose();
      await model.dispose();
    },
  };
}
