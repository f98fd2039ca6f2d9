/**
 * spotkube error system module
 */

export {
  ErrorCategory,
  ErrorSeverity,
  ErrorCodeRegistry,
  SpotkubeError,
  ConfigurationError,
  StateError,
  AllocationError,
  ProviderError,
  ReadinessError,
  BootstrapError,
  RemoteCommandError,
  TeardownError,
  renderMessage,
  isSpotkubeError,
  extractErrorDetails,
  type ErrorCode
} from '../core/errors/taxonomy';

export { SPOTKUBE_ERROR_CODES } from '../core/errors/codes';
