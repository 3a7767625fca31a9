import { ErrorCategory, ErrorCodeRegistry } from './taxonomy'

export const ERROR_CODES = {
    CONFIG_INVALID: ErrorCodeRegistry.register({
        code: 'CONFIG_INVALID',
        category: ErrorCategory.CONFIGURATION,
        message: 'Deployment configuration failed validation',
        suggestions: ['Check command line flags, AZURE_DOCKER_VM_* environment variables and config file'],
    }),
    CONFIG_FILE_UNREADABLE: ErrorCodeRegistry.register({
        code: 'CONFIG_FILE_UNREADABLE',
        category: ErrorCategory.CONFIGURATION,
        message: 'Configuration file could not be read or is not valid JSON',
    }),
    AZURE_LOGIN_FAILED: ErrorCodeRegistry.register({
        code: 'AZURE_LOGIN_FAILED',
        category: ErrorCategory.AUTHENTICATION,
        message: 'Could not obtain an Azure management token',
        suggestions: ['Run "az login" or set AZURE_CLIENT_ID, AZURE_TENANT_ID and AZURE_CLIENT_SECRET'],
        docsUrl: 'https://learn.microsoft.com/azure/developer/javascript/sdk/authentication/overview',
    }),
    AZURE_NO_SUBSCRIPTION: ErrorCodeRegistry.register({
        code: 'AZURE_NO_SUBSCRIPTION',
        category: ErrorCategory.AUTHENTICATION,
        message: 'No enabled Azure subscription available to the current identity',
        suggestions: ['Pass --subscription or set AZURE_SUBSCRIPTION_ID'],
    }),
    PUBLIC_IP_DETECTION_FAILED: ErrorCodeRegistry.register({
        code: 'PUBLIC_IP_DETECTION_FAILED',
        category: ErrorCategory.NETWORK,
        message: 'Public IP detection failed',
    }),
    SSH_KEY_UNAVAILABLE: ErrorCodeRegistry.register({
        code: 'SSH_KEY_UNAVAILABLE',
        category: ErrorCategory.SYSTEM,
        message: 'SSH key pair could not be read or generated',
    }),
    BOOTSTRAP_TEMPLATE_INVALID: ErrorCodeRegistry.register({
        code: 'BOOTSTRAP_TEMPLATE_INVALID',
        category: ErrorCategory.VALIDATION,
        message: 'Bootstrap script template could not be rendered',
    }),
    PROVIDER_NOT_CONNECTED: ErrorCodeRegistry.register({
        code: 'PROVIDER_NOT_CONNECTED',
        category: ErrorCategory.PROVIDER,
        message: 'Provider client used before connect()',
    }),
    RESOURCE_GROUP_FAILED: ErrorCodeRegistry.register({
        code: 'RESOURCE_GROUP_FAILED',
        category: ErrorCategory.PROVIDER,
        message: 'Resource group operation failed',
    }),
    DEPLOYMENT_SUBMIT_FAILED: ErrorCodeRegistry.register({
        code: 'DEPLOYMENT_SUBMIT_FAILED',
        category: ErrorCategory.DEPLOYMENT,
        message: 'Template deployment was rejected by Azure Resource Manager',
    }),
    DEPLOYMENT_TIMEOUT: ErrorCodeRegistry.register({
        code: 'DEPLOYMENT_TIMEOUT',
        category: ErrorCategory.DEPLOYMENT,
        message: 'Deployment did not reach a terminal state in time',
        suggestions: ['Check deployment status in Azure portal, resources may still be provisioning'],
    }),
} as const
