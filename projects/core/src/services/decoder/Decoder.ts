import type {
  ChannelPredictions,
  ScoreMatrix,
} from "../../interfaces/IDiacritizationModel.js";
import { AlphabetCodec, MASK_INDEX } from "../../alphabet/AlphabetCodec.js";
import { CHANNELS } from "../../alphabet/AlphabetTables.js";
import { PredictionFailedError } from "../../errors/DiacritizationError.js";

export interface MergeInput extends ChannelPredictions {
  /** Original characters, one per code point */
  readonly letters: readonly string[];
  /** Vocabulary indices of the normalized characters */
  readonly indices: ArrayLike<number>;
  /** Number of real (unpadded) positions */
  readonly length: number;
}

/**
 * Index of the highest score at `position`. The lowest index wins ties and
 * NaN never wins, so an all-NaN row decodes to class 0 (MASK).
 */
export function argmax(matrix: ScoreMatrix, position: number): number {
  const offset = position * matrix.classes;
  let bestIndex = 0;
  let bestScore = Number.NEGATIVE_INFINITY;

  for (let c = 0; c < matrix.classes; c++) {
    const score = matrix.data[offset + c] ?? Number.NaN;
    if (score > bestScore) {
      bestScore = score;
      bestIndex = c;
    }
  }

  return bestIndex;
}

/**
 * Rebuilds vocalized text from model predictions.
 *
 * Marks follow each letter in the order dagesh, shin/sin dot, vowel, which is
 * the stacking order Hebrew rendering expects. A channel only contributes
 * when the original letter is eligible for it and its argmax is neither MASK
 * nor RAFE.
 */
export class Decoder {
  constructor(private readonly codec: AlphabetCodec = new AlphabetCodec()) {}

  merge(input: Readonly<MergeInput>): string {
    const length = Math.min(input.length, input.letters.length, input.indices.length);

    for (const channel of CHANNELS) {
      if (input[channel].rows < length) {
        throw new PredictionFailedError(
          `${channel} predictions cover ${input[channel].rows} of ${length} positions`
        );
      }
    }

    let result = "";
    for (let i = 0; i < length; i++) {
      // Padding reached
      if (input.indices[i] === MASK_INDEX) {
        break;
      }

      const letter = input.letters[i] ?? "";
      result += letter;

      for (const channel of CHANNELS) {
        if (!this.codec.isEligible(channel, letter)) {
          continue;
        }
        const glyph = this.codec.glyph(channel, argmax(input[channel], i));
        if (glyph !== undefined) {
          result += glyph;
        }
      }
    }

    return result;
  }
}

export function createDecoder(codec?: AlphabetCodec): Decoder {
  return new Decoder(codec);
}
