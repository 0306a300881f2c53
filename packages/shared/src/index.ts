export {
  EnvConfigError,
  booleanVar,
  hostVar,
  integerVar,
  loadEnvConfig,
  portVar,
  stringVar
} from './envConfig';
export type {
  BooleanVarOptions,
  EnvSource,
  HostPortOptions,
  IntegerVarOptions,
  LoadEnvConfigOptions,
  StringVarOptions
} from './envConfig';
