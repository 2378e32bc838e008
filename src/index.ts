export {
  resolveConfig,
  loadConfig,
  getTargetEnvironment,
  getBackendUrl,
  configSchema,
  FRAMEWORKS,
} from './config.js';
export type { ConfigInput, GeneratorConfig, EnvironmentConfig, OutputStrategy } from './config.js';

export {
  TypedRoutesError,
  ConfigError,
  DescriptorSourceError,
  DiscoveryValidationError,
  OutputCollisionError,
  TypeMappingError,
  GenerationError,
  IOError,
  ErrorCode,
  DiagnosticCollector,
  isTypedRoutesError,
  isFatalError,
  describeError,
  formatDiagnostics,
} from './errors.js';
export type { Diagnostic, DiagnosticSeverity, ErrorDetails } from './errors.js';

export { logInfo, logWarning, logData, logError } from './logger.js';

export * from './codegen/index.js';
