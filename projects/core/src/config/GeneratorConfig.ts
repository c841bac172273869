import { resolve } from "node:path";
import { z } from "zod";

import { InvalidConfigError } from "../errors/DiacritizationError.js";
import { NAKDIMON_INPUT_LENGTH } from "../services/model-manager/ModelRegistry.js";

export interface GeneratorConfig {
  /** Quiet interval before a generate() call starts running */
  readonly debounceMs: number;
  /** Segment length bound, never above the model input length */
  readonly maxLength: number;
  readonly modelId: string;
  /** Directory holding bundled model artifacts */
  readonly modelsDir: string;
}

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  debounceMs: 300,
  maxLength: NAKDIMON_INPUT_LENGTH,
  modelId: "nakdimon",
  modelsDir: resolve(process.cwd(), "models"),
};

const envSchema = z.object({
  NIQQUD_DEBOUNCE_MS: z.coerce.number().int().nonnegative().optional(),
  NIQQUD_MAX_LENGTH: z.coerce.number().int().min(2).optional(),
  NIQQUD_MODEL_ID: z.string().min(1).optional(),
  NIQQUD_MODELS_DIR: z.string().min(1).optional(),
});

/**
 * Merges overrides over the defaults. Undefined overrides keep the default.
 */
export function resolveGeneratorConfig(
  overrides?: Readonly<Partial<GeneratorConfig>>
): GeneratorConfig {
  return {
    debounceMs: overrides?.debounceMs ?? DEFAULT_GENERATOR_CONFIG.debounceMs,
    maxLength: overrides?.maxLength ?? DEFAULT_GENERATOR_CONFIG.maxLength,
    modelId: overrides?.modelId ?? DEFAULT_GENERATOR_CONFIG.modelId,
    modelsDir: overrides?.modelsDir ?? DEFAULT_GENERATOR_CONFIG.modelsDir,
  };
}

/**
 * Reads NIQQUD_* variables. Unset variables keep their defaults.
 *
 * @throws {InvalidConfigError} When a variable is set to an invalid value
 */
export function loadConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env
): GeneratorConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigError(
      "environment",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return resolveGeneratorConfig({
    ...(vars.NIQQUD_DEBOUNCE_MS !== undefined && { debounceMs: vars.NIQQUD_DEBOUNCE_MS }),
    ...(vars.NIQQUD_MAX_LENGTH !== undefined && { maxLength: vars.NIQQUD_MAX_LENGTH }),
    ...(vars.NIQQUD_MODEL_ID !== undefined && { modelId: vars.NIQQUD_MODEL_ID }),
    ...(vars.NIQQUD_MODELS_DIR !== undefined && {
      modelsDir: resolve(vars.NIQQUD_MODELS_DIR),
    }),
  });
}
