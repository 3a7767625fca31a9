/**
 * Deployment configuration: schema, defaults and loading from file, environment and CLI flags
 */

export {
    DeploymentConfigSchema,
    DeploymentConfigInputSchema,
    expandHomeDir,
    type DeploymentConfig,
    type DeploymentConfigInput,
    type AuthConfig,
    type SshAuthConfig,
    type PasswordAuthConfig,
    type NetworkNames,
} from './interface'
export {
    ConfigLoader,
    DEFAULT_DEPLOYMENT_CONFIG,
    CONFIG_ENV_VARS,
    type DeploymentConfigOverrides,
    type LoadConfigArgs,
} from './default'
export { redactSecrets } from './redact'
