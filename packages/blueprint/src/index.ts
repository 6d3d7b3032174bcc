/**
 * @lakestack/blueprint
 * Config schema, validation and endpoint derivation for lakestack
 */

// Schema types
export type {
  StackMode,
  StackConfig,
  ResolvedStackConfig,
  Credentials,
  MemoryConfig,
  StorageConfig,
  ImageConfig,
  GitOpsConfig,
  ComposeConfig,
  HealthConfig,
  OverlayConfig,
  ResolvedOverlay,
  ServiceEndpoint,
  ServiceEndpoints,
  ValidationResult,
  ValidationError,
} from './schema.js';
export { STACK_MODES } from './schema.js';

// Defaults
export {
  DEFAULT_MODE,
  DEFAULT_OUTPUT_DIRS,
  DEFAULT_OVERLAY_NAMES,
  DEFAULT_CREDENTIALS,
  DEFAULT_MEMORY,
  DEFAULT_STORAGE,
  DEFAULT_IMAGES,
  DEFAULT_GITOPS,
  DEFAULT_COMPOSE,
  DEFAULT_HEALTH,
  SERVICE_NAMES,
  CONTAINER_NAMES,
  SERVICE_PORTS,
  HEALTH_PATHS,
} from './defaults.js';

// Parser
export {
  CONFIG_DIR,
  CONFIG_FILENAME,
  findConfigFile,
  parseConfig,
  parseConfigFromDir,
  readStackConfig,
  mergeConfig,
  validateConfig,
  resolveOverlays,
  resolveConfig,
} from './parser.js';

// Naming
export {
  isValidIdentifier,
  assertIdentifier,
  isValidComposeProjectName,
  getNamespaceStem,
  getOverlayNamespace,
  getApplicationName,
} from './naming.js';

// Endpoints
export { deriveEndpoints, hostEndpoints, endpointUrl } from './endpoints.js';

// Credentials
export type { CredentialSource } from './credentials.js';
export { staticCredentials, envCredentials, ACCESS_KEY_ENV, SECRET_KEY_ENV } from './credentials.js';

// Errors
export {
  StackError,
  ConfigValidationError,
  ConfigNotFoundError,
  MissingRequiredFieldError,
  InvalidIdentifierError,
  UnknownArtifactKindError,
  DuplicateArtifactPathError,
  ArtifactWriteFailedError,
  WorkspaceLockedError,
  UnsafeResetError,
  InvalidTransitionError,
} from './errors.js';
