/**
 * Test configuration and utilities.
 * Provides consistent paths and settings for all tests.
 */

import { describe } from "vitest";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Resolves the project root directory by walking up from this file.
 */
function findProjectRoot(): string {
  const thisDir = fileURLToPath(new URL(".", import.meta.url));
  // From src/__tests__ -> src -> core -> projects -> root
  return resolve(thisDir, "../../../..");
}

export const PROJECT_ROOT = findProjectRoot();

/**
 * Bundled model artifacts, laid out as `<MODELS_DIR>/<modelId>/<file>`.
 */
export const MODELS_DIR = resolve(
  process.env.NIQQUD_MODELS_DIR ?? resolve(PROJECT_ROOT, "models")
);

/**
 * Whether to run integration tests against the real ONNX model.
 * Set RUN_INTEGRATION_TESTS=true and place the artifact under MODELS_DIR.
 */
export const RUN_INTEGRATION_TESTS =
  process.env.RUN_INTEGRATION_TESTS === "true";

/**
 * Helper to conditionally describe integration test suites.
 * Skips the suite unless RUN_INTEGRATION_TESTS is enabled.
 */
export const describeIntegration = RUN_INTEGRATION_TESTS
  ? describe
  : describe.skip;
