export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ConfigFileStore, type WriteMode } from "./adapters/fs/config-file-store"
export { TomlCodec } from "./adapters/toml/toml-codec"
export {
  createBootstrapConfig,
  generateBootstrapFile,
  type GenerateBootstrapOptions,
} from "./core/bootstrap/bootstrap"
export { applyDocument, findUnknownKeys } from "./core/codec/decode"
export { DecodedDocument } from "./core/codec/document"
export { encodeConfig } from "./core/codec/encode"
export * from "./core/constants"
export {
  createDefaultConfig,
  createDefaultMinValuableConfig,
  createDeprecatedConfig,
} from "./core/defaults/defaults"
export { defaultPaths, detectHost, type DefaultPaths, type HostInfo, nullDevice } from "./core/defaults/host"
export {
  applyEnvOverrides,
  type ApplyEnvOptions,
  ENV_HUB_PASSWORD,
  ENV_HUB_URL,
  ENV_HUB_USER,
  type EnvRecord,
  loadEnvironment,
} from "./core/env/apply-env"
export {
  BandwidthParseError,
  ConfigDecodeError,
  ConfigIoError,
  ConfigNotFoundError,
  ConfigValidationError,
  type FileOperation,
} from "./core/errors"
export { mergeConfigDocument, readConfigDocument, type ReadConfigOptions } from "./core/merge/merge-file"
export { migrateDeprecated, type MigrateOptions } from "./core/migrate/migrate-deprecated"
export {
  dumpConfig,
  saveConfigFile,
  type SaveConfigOptions,
  updateCheckIntervalMs,
} from "./core/persist/persist"
export { ResolvedConfig } from "./core/resolved-config"
export { agentConfigSchema, deprecatedSchema, minValuableSchema } from "./core/schema/agent-config.schema"
export { descriptorsFor, type Descriptor, type FieldOptions } from "./core/schema/descriptor"
export { reconfigureFromEnv, setupConfig, type SetupConfigOptions } from "./core/setup"
export { parseBandwidth } from "./core/validation/bandwidth"
export { validateConfig, type ValidateOptions, type ValidationReport } from "./core/validation/validate"
export {
  type AgentConfig,
  type AgentLogLevel,
  agentLogLevels,
  type CpuUtilisationAnalysisConfig,
  type DeepReadonly,
  type DeprecatedConfig,
  type DockerMonitoringConfig,
  type IoMode,
  ioModes,
  type JobMonitoringConfig,
  type JobSeverity,
  jobSeverities,
  type LogsFilesConfig,
  type MinValuableConfig,
  type MysqlMonitoringConfig,
  type OperationMode,
  operationModes,
  type ProcessMonitoringConfig,
  type ReadonlyAgentConfig,
  type SelfUpdateConfig,
  type StorCliConfig,
  type SystemUpdatesChecksConfig,
} from "./ports/agent-config"
export type { StructuredCodec } from "./ports/codec"
export type { IResolvedConfig, ValueOrigin } from "./ports/config"
export type { EnvironmentSource } from "./ports/environment-source"
