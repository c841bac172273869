import { z } from "zod";

import rawTables from "./nakdimon-tables.json" with { type: "json" };
import { InvalidConfigError } from "../errors/DiacritizationError.js";

/**
 * Diacritic channels predicted by the model, in the order marks are stacked
 * after a letter.
 */
export const CHANNELS = ["dagesh", "sin", "niqqud"] as const;

export type Channel = (typeof CHANNELS)[number];

/**
 * Class indices below this value (MASK, RAFE) never emit a glyph.
 */
export const FIRST_EMITTING_CLASS = 2;

const codePoint = z
  .string()
  .refine((value) => [...value].length === 1, "expected a single code point");

const codePoints = z.string().min(1);

const tablesSchema = z
  .object({
    letters: z.array(z.string()).min(4),
    specialSymbols: z.object({
      mask: z.literal(""),
      ligature: codePoint,
      unknown: codePoint,
      digit: codePoint,
    }),
    outputs: z.object({
      niqqud: z.array(z.string()).min(FIRST_EMITTING_CLASS + 1),
      dagesh: z.array(z.string()).min(FIRST_EMITTING_CLASS + 1),
      sin: z.array(z.string()).min(FIRST_EMITTING_CLASS + 1),
    }),
    eligibility: z.object({
      niqqud: codePoints,
      dagesh: codePoints,
      sin: codePoints,
    }),
    folds: z.object({
      finals: z.record(codePoint, codePoint),
      space: codePoints,
      hyphen: codePoints,
      openParen: codePoints,
      closeParen: codePoints,
      apostrophe: codePoints,
      doubleQuote: codePoints,
      comma: codePoints,
      ligature: codePoints,
    }),
  })
  .superRefine((tables, ctx) => {
    if (tables.letters[0] !== tables.specialSymbols.mask) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["letters", 0],
        message: "index 0 must be the MASK symbol",
      });
    }

    const seen = new Set<string>();
    tables.letters.slice(1).forEach((symbol, offset) => {
      if (seen.has(symbol)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["letters", offset + 1],
          message: `duplicate symbol ${JSON.stringify(symbol)}`,
        });
      }
      seen.add(symbol);
    });

    const { ligature, unknown, digit } = tables.specialSymbols;
    for (const [name, symbol] of Object.entries({ ligature, unknown, digit })) {
      if (!seen.has(symbol)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["specialSymbols", name],
          message: `${name} symbol is not in the vocabulary`,
        });
      }
    }
  });

export type AlphabetTablesInput = z.input<typeof tablesSchema>;

/**
 * Validated, frozen character tables.
 */
export interface AlphabetTables {
  readonly letters: readonly string[];
  readonly ligatureSymbol: string;
  readonly unknownSymbol: string;
  readonly digitSymbol: string;
  readonly outputs: Readonly<Record<Channel, readonly string[]>>;
  readonly eligibility: Readonly<Record<Channel, ReadonlySet<string>>>;
  /** Input character -> vocabulary symbol, excluding digits */
  readonly folds: ReadonlyMap<string, string>;
}

/**
 * Validates raw tables and builds the lookup structures.
 *
 * @throws {InvalidConfigError} When the tables are malformed
 */
export function parseAlphabetTables(input: unknown): AlphabetTables {
  const parsed = tablesSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(
      "alphabet tables",
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
      )
    );
  }

  const tables = parsed.data;
  const folds = new Map<string, string>(Object.entries(tables.folds.finals));
  const foldAll = (chars: string, target: string): void => {
    for (const ch of chars) {
      folds.set(ch, target);
    }
  };

  foldAll(tables.folds.space, " ");
  foldAll(tables.folds.hyphen, "-");
  foldAll(tables.folds.openParen, "(");
  foldAll(tables.folds.closeParen, ")");
  foldAll(tables.folds.apostrophe, "'");
  foldAll(tables.folds.doubleQuote, '"');
  foldAll(tables.folds.comma, ",");
  foldAll(tables.folds.ligature, tables.specialSymbols.ligature);

  return Object.freeze({
    letters: Object.freeze([...tables.letters]),
    ligatureSymbol: tables.specialSymbols.ligature,
    unknownSymbol: tables.specialSymbols.unknown,
    digitSymbol: tables.specialSymbols.digit,
    outputs: Object.freeze({
      niqqud: Object.freeze([...tables.outputs.niqqud]),
      dagesh: Object.freeze([...tables.outputs.dagesh]),
      sin: Object.freeze([...tables.outputs.sin]),
    }),
    eligibility: Object.freeze({
      niqqud: new Set(tables.eligibility.niqqud),
      dagesh: new Set(tables.eligibility.dagesh),
      sin: new Set(tables.eligibility.sin),
    }),
    folds,
  });
}

/**
 * Tables of the bundled Nakdimon model, parsed once at module load.
 */
export const NAKDIMON_TABLES: AlphabetTables = parseAlphabetTables(rawTables);
