export {
  NiqqudGenerator,
  createNiqqudGenerator,
  type GenerationState,
  type GenerationRequest,
  type GenerationResult,
  type GeneratorSnapshot,
  type NiqqudGeneratorOptions,
  type ResultListener,
  type SnapshotListener,
} from "./NiqqudGenerator.js";
export {
  createNiqqudRuntime,
  type NiqqudRuntime,
  type NiqqudRuntimeOptions,
} from "./runtime.js";
