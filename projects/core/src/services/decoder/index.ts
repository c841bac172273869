export { Decoder, createDecoder, argmax, type MergeInput } from "./Decoder.js";
