import { describe, it, expect } from "vitest";

import rawTables from "../nakdimon-tables.json" with { type: "json" };
import { AlphabetCodec, MASK_INDEX } from "../AlphabetCodec.js";
import { NAKDIMON_TABLES, parseAlphabetTables } from "../AlphabetTables.js";
import { InvalidConfigError } from "../../errors/DiacritizationError.js";

const SHIN = "ש";
const LAMED = "ל";
const VAV = "ו";
const FINAL_MEM = "ם";
const MEM = "מ";

describe("AlphabetCodec", () => {
  const codec = new AlphabetCodec();

  describe("vocabulary", () => {
    it("has 43 entries with MASK at index 0", () => {
      expect(codec.size).toBe(43);
      expect(codec.decode(MASK_INDEX)).toBe("");
    });

    it("places the placeholder classes at 1-3", () => {
      expect(codec.decode(1)).toBe("H");
      expect(codec.decode(2)).toBe("O");
      expect(codec.decode(3)).toBe("5");
      expect(codec.unknownIndex).toBe(2);
    });

    it("places alef at 16 and tav at 42", () => {
      expect(codec.decode(16)).toBe("א");
      expect(codec.decode(42)).toBe("ת");
    });

    it("encode and decode are inverses over the vocabulary", () => {
      for (let index = 1; index < codec.size; index++) {
        expect(codec.encode(codec.decode(index))).toBe(index);
      }
    });

    it("encodes unmapped symbols to the unknown class", () => {
      expect(codec.encode("x")).toBe(2);
      expect(codec.encode("")).toBe(2);
    });

    it("decodes out-of-range indices to the unknown symbol", () => {
      expect(codec.decode(99)).toBe("O");
      expect(codec.decode(-1)).toBe("O");
    });
  });

  describe("normalize()", () => {
    it.each([
      { input: SHIN, expected: SHIN },
      { input: FINAL_MEM, expected: FINAL_MEM },
      { input: " ", expected: " " },
      { input: "?", expected: "?" },
      { input: "\n", expected: " " },
      { input: "\r", expected: " " },
      { input: "\t", expected: " " },
      { input: "־", expected: "-" },
      { input: "–", expected: "-" },
      { input: "—", expected: "-" },
      { input: "−", expected: "-" },
      { input: "[", expected: "(" },
      { input: "]", expected: ")" },
      { input: "´", expected: "'" },
      { input: "’", expected: "'" },
      { input: "“", expected: '"' },
      { input: "״", expected: '"' },
      { input: "7", expected: "5" },
      { input: "٣", expected: "5" },
      { input: "…", expected: "," },
      { input: "װ", expected: "H" },
      { input: "ײ", expected: "H" },
      { input: "a", expected: "O" },
      { input: "\u{1F600}", expected: "O" },
    ])("maps $input to $expected", ({ input, expected }) => {
      expect(codec.normalize(input)).toBe(expected);
    });

    it("maps every BMP code point to a vocabulary symbol", () => {
      const vocabulary = new Set(NAKDIMON_TABLES.letters.slice(1));
      const outside: number[] = [];

      for (let cp = 0; cp <= 0xffff; cp++) {
        // Lone surrogates are not characters
        if (cp >= 0xd800 && cp <= 0xdfff) {
          continue;
        }
        if (!vocabulary.has(codec.normalize(String.fromCodePoint(cp)))) {
          outside.push(cp);
        }
      }

      expect(outside).toEqual([]);
    });

    it("folds final forms when the vocabulary has no finals", () => {
      const finals = new Set(["ך", "ם", "ן", "ף", "ץ"]);
      const withoutFinals = new AlphabetCodec(
        parseAlphabetTables({
          ...rawTables,
          letters: rawTables.letters.filter((symbol) => !finals.has(symbol)),
        })
      );

      expect(withoutFinals.normalize(FINAL_MEM)).toBe(MEM);
      expect(withoutFinals.normalize("ך")).toBe("כ");
    });
  });

  describe("encodeText()", () => {
    it("pairs original characters with normalized indices", () => {
      const { letters, indices } = codec.encodeText(`${SHIN}${LAMED}${VAV}${FINAL_MEM}!`);

      expect(letters).toEqual([SHIN, LAMED, VAV, FINAL_MEM, "!"]);
      expect([...indices]).toEqual([41, 28, 21, 29, 5]);
    });

    it("keeps the original character when normalization folds it", () => {
      const { letters, indices } = codec.encodeText("\n9");

      expect(letters).toEqual(["\n", "9"]);
      expect([...indices]).toEqual([4, 3]);
    });

    it("treats a surrogate pair as one position", () => {
      const { letters, indices } = codec.encodeText("a\u{1F600}");

      expect(letters).toHaveLength(2);
      expect([...indices]).toEqual([2, 2]);
    });

    it("returns empty arrays for empty text", () => {
      const { letters, indices } = codec.encodeText("");

      expect(letters).toEqual([]);
      expect(indices).toHaveLength(0);
    });
  });

  describe("eligibility", () => {
    it.each([
      { channel: "sin" as const, letter: SHIN, expected: true },
      { channel: "sin" as const, letter: "ס", expected: false },
      { channel: "dagesh" as const, letter: "ב", expected: true },
      { channel: "dagesh" as const, letter: "א", expected: false },
      { channel: "dagesh" as const, letter: "ר", expected: false },
      { channel: "niqqud" as const, letter: "א", expected: true },
      { channel: "niqqud" as const, letter: "ן", expected: true },
      { channel: "niqqud" as const, letter: FINAL_MEM, expected: false },
      { channel: "niqqud" as const, letter: "a", expected: false },
    ])("$channel eligibility of $letter is $expected", ({ channel, letter, expected }) => {
      expect(codec.isEligible(channel, letter)).toBe(expected);
    });
  });

  describe("glyph()", () => {
    it("emits nothing for MASK and RAFE", () => {
      for (const channel of ["niqqud", "dagesh", "sin"] as const) {
        expect(codec.glyph(channel, 0)).toBeUndefined();
        expect(codec.glyph(channel, 1)).toBeUndefined();
      }
    });

    it("maps emitting classes to their marks", () => {
      expect(codec.glyph("dagesh", 2)).toBe("ּ");
      expect(codec.glyph("sin", 2)).toBe("ׁ");
      expect(codec.glyph("sin", 3)).toBe("ׂ");
      expect(codec.glyph("niqqud", 2)).toBe("ְ");
      expect(codec.glyph("niqqud", 10)).toBe("ָ");
      expect(codec.glyph("niqqud", 15)).toBe("ַ");
    });

    it("returns undefined for classes beyond the table", () => {
      expect(codec.glyph("dagesh", 3)).toBeUndefined();
      expect(codec.glyph("niqqud", 16)).toBeUndefined();
    });

    it("reports class counts per channel", () => {
      expect(codec.classCount("niqqud")).toBe(16);
      expect(codec.classCount("dagesh")).toBe(3);
      expect(codec.classCount("sin")).toBe(4);
    });
  });
});

describe("parseAlphabetTables", () => {
  it("rejects a vocabulary without MASK at index 0", () => {
    expect(() =>
      parseAlphabetTables({ ...rawTables, letters: ["x", ...rawTables.letters.slice(1)] })
    ).toThrow(InvalidConfigError);
  });

  it("rejects duplicate symbols", () => {
    expect(() =>
      parseAlphabetTables({ ...rawTables, letters: [...rawTables.letters, "?"] })
    ).toThrow(/duplicate symbol/);
  });

  it("rejects special symbols missing from the vocabulary", () => {
    expect(() =>
      parseAlphabetTables({
        ...rawTables,
        specialSymbols: { ...rawTables.specialSymbols, unknown: "§" },
      })
    ).toThrow(/unknown symbol is not in the vocabulary/);
  });
});
