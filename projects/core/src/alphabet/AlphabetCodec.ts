import {
  FIRST_EMITTING_CLASS,
  NAKDIMON_TABLES,
  type AlphabetTables,
  type Channel,
} from "./AlphabetTables.js";

/**
 * Index of the padding symbol. Never produced by normalize().
 */
export const MASK_INDEX = 0;

const DECIMAL_DIGIT = /^\p{Nd}$/u;

/**
 * Characters of a text paired with the vocabulary index of their normalized
 * form. Both arrays are indexed by code point, not UTF-16 unit.
 */
export interface EncodedText {
  readonly letters: readonly string[];
  readonly indices: Int32Array;
}

/**
 * Maps input characters onto the model vocabulary and back.
 *
 * Every function here is total: unrecognised input lands in the unknown
 * class instead of throwing.
 */
export class AlphabetCodec {
  readonly tables: AlphabetTables;
  readonly unknownIndex: number;
  private readonly symbolToIndex: ReadonlyMap<string, number>;

  constructor(tables: AlphabetTables = NAKDIMON_TABLES) {
    this.tables = tables;

    const symbolToIndex = new Map<string, number>();
    tables.letters.forEach((symbol, index) => {
      if (index !== MASK_INDEX) {
        symbolToIndex.set(symbol, index);
      }
    });
    this.symbolToIndex = symbolToIndex;
    this.unknownIndex = symbolToIndex.get(tables.unknownSymbol) ?? MASK_INDEX;
  }

  /** Number of vocabulary entries, MASK included. */
  get size(): number {
    return this.tables.letters.length;
  }

  /**
   * Maps one character to the vocabulary symbol the model was trained on.
   */
  normalize(char: string): string {
    if (this.symbolToIndex.has(char)) {
      return char;
    }

    const folded = this.tables.folds.get(char);
    if (folded !== undefined) {
      return folded;
    }

    if (DECIMAL_DIGIT.test(char)) {
      return this.tables.digitSymbol;
    }

    return this.tables.unknownSymbol;
  }

  encode(symbol: string): number {
    return this.symbolToIndex.get(symbol) ?? this.unknownIndex;
  }

  decode(index: number): string {
    return this.tables.letters[index] ?? this.tables.unknownSymbol;
  }

  /**
   * Splits text into code points and encodes each normalized symbol.
   */
  encodeText(text: string): EncodedText {
    const letters = Array.from(text);
    const indices = new Int32Array(letters.length);

    letters.forEach((letter, i) => {
      indices[i] = this.encode(this.normalize(letter));
    });

    return { letters, indices };
  }

  /**
   * Whether a letter may carry the given channel's mark.
   */
  isEligible(channel: Channel, letter: string): boolean {
    return this.tables.eligibility[channel].has(letter);
  }

  /**
   * Glyph for a channel class, or undefined for MASK/RAFE and unknown classes.
   */
  glyph(channel: Channel, classIndex: number): string | undefined {
    if (classIndex < FIRST_EMITTING_CLASS) {
      return undefined;
    }
    return this.tables.outputs[channel][classIndex];
  }

  classCount(channel: Channel): number {
    return this.tables.outputs[channel].length;
  }
}

export function createAlphabetCodec(tables?: AlphabetTables): AlphabetCodec {
  return new AlphabetCodec(tables);
}
