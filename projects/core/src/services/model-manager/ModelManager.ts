import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";

import type { IModelManager, ModelInfo } from "../../interfaces/IModelManager.js";
import { ModelNotFoundError } from "../../errors/DiacritizationError.js";
import { getModelInfo, listModels } from "./ModelRegistry.js";

export interface ModelManagerOptions {
  /** Directory holding one subdirectory per bundled model */
  readonly modelsDir: string;
}

/**
 * Resolves bundled model artifacts on disk. Models ship with the
 * application; nothing is downloaded.
 */
export class ModelManager implements IModelManager {
  private readonly modelsDir: string;

  constructor(options: Readonly<ModelManagerOptions>) {
    this.modelsDir = options.modelsDir;
  }

  async isModelCached(modelId: string): Promise<boolean> {
    const modelPath = await this.getModelPath(modelId);
    return modelPath !== undefined;
  }

  async getModelPath(modelId: string): Promise<string | undefined> {
    const info = getModelInfo(modelId);
    if (!info) {
      return undefined;
    }

    const modelDir = join(this.modelsDir, modelId);
    const missing = await this.findMissingFiles(modelDir, info);
    return missing.length === 0 ? modelDir : undefined;
  }

  async ensureModel(modelId: string): Promise<string> {
    const info = getModelInfo(modelId);
    if (!info) {
      throw new ModelNotFoundError(modelId, "not registered");
    }

    const modelDir = join(this.modelsDir, modelId);
    const missing = await this.findMissingFiles(modelDir, info);
    if (missing.length > 0) {
      throw new ModelNotFoundError(
        modelId,
        `missing ${missing.join(", ")} in ${modelDir}`
      );
    }

    return modelDir;
  }

  getModelInfo(modelId: string): ModelInfo | undefined {
    return getModelInfo(modelId);
  }

  listModels(): readonly ModelInfo[] {
    return listModels();
  }

  async listCachedModels(): Promise<readonly string[]> {
    // No models directory means nothing is bundled
    const entries = await readdir(this.modelsDir, { withFileTypes: true }).catch(
      () => null
    );
    if (!entries) {
      return [];
    }

    const cached: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory() && (await this.isModelCached(entry.name))) {
        cached.push(entry.name);
      }
    }
    return cached;
  }

  private async findMissingFiles(
    modelDir: string,
    info: ModelInfo
  ): Promise<readonly string[]> {
    const missing: string[] = [];
    for (const file of info.files) {
      try {
        const stats = await stat(join(modelDir, file.path));
        if (!stats.isFile()) {
          missing.push(file.path);
        }
      } catch {
        missing.push(file.path);
      }
    }
    return missing;
  }
}

export function createModelManager(modelsDir: string): ModelManager {
  return new ModelManager({ modelsDir });
}
