export {
  Vocalizer,
  createVocalizer,
  type VocalizerOptions,
  type VocalizeOptions,
  type VocalizerDiagnostics,
} from "./Vocalizer.js";
