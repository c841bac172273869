export {
  AlphabetCodec,
  createAlphabetCodec,
  MASK_INDEX,
  type EncodedText,
} from "./AlphabetCodec.js";
export {
  CHANNELS,
  FIRST_EMITTING_CLASS,
  NAKDIMON_TABLES,
  parseAlphabetTables,
  type AlphabetTables,
  type AlphabetTablesInput,
  type Channel,
} from "./AlphabetTables.js";
export { stripDiacritics, hasDiacritics, isHebrewMark } from "./diacritics.js";
