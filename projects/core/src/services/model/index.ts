export {
  OnnxDiacritizationModel,
  createOnnxDiacritizationModel,
  type OnnxDiacritizationModelOptions,
  type InferenceSessionFactory,
  type InferenceSessionLike,
} from "./OnnxDiacritizationModel.js";
