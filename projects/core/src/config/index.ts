export {
  DEFAULT_GENERATOR_CONFIG,
  loadConfigFromEnv,
  resolveGeneratorConfig,
  type GeneratorConfig,
} from "./GeneratorConfig.js";
