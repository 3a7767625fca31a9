/**
 * Error system exports
 */

export {
  ErrorCategory,
  ErrorCodeRegistry,
  DockerVmError,
  ValidationError,
  ConfigurationError,
  AuthenticationError,
  NetworkError,
  ProviderError,
  DeploymentError,
  createError,
  isDockerVmError,
  type ErrorCode,
  type DockerVmErrorOptions
} from '../core/errors/taxonomy';

export { ERROR_CODES } from '../core/errors/codes';

export { DeploymentRejectedError } from '../core/errors/deployment';
