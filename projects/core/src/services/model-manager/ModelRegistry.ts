import type { ModelInfo, ModelSignature } from "../../interfaces/IModelManager.js";

/**
 * Fixed input length of the bundled Nakdimon export.
 */
export const NAKDIMON_INPUT_LENGTH = 10_000;

export const NAKDIMON_SIGNATURE: ModelSignature = {
  input: "input",
  outputs: {
    niqqud: "niqqud",
    dagesh: "dagesh",
    sin: "sin",
  },
  inputLength: NAKDIMON_INPUT_LENGTH,
};

const MODEL_REGISTRY: Readonly<Record<string, ModelInfo>> = {
  nakdimon: {
    id: "nakdimon",
    name: "Nakdimon Hebrew Diacritizer",
    format: "onnx",
    source: "https://github.com/elazarg/nakdimon",
    files: [{ path: "nakdimon.onnx" }],
    signature: NAKDIMON_SIGNATURE,
  },
};

export function getModelInfo(modelId: string): ModelInfo | undefined {
  return isModelRegistered(modelId) ? MODEL_REGISTRY[modelId] : undefined;
}

export function listModels(): readonly ModelInfo[] {
  return Object.values(MODEL_REGISTRY);
}

export function isModelRegistered(modelId: string): boolean {
  return Object.hasOwn(MODEL_REGISTRY, modelId);
}
