/**
 * Azure provider: session, Resource Manager client and deployment template
 */

export { AzureProviderClient, AzureProvisioningState, type AzureProviderClientArgs } from './sdk-client';
export { AzureSession, AZURE_MANAGEMENT_SCOPE, type AzureSessionArgs, type AzureCredentialFactory } from './session';
export { buildDeploymentTemplate, toArmParameterValues, TEMPLATE_PARAMETER_NAMES, type ArmTemplate } from './template';
export { errorDetailFromThrown, toDeploymentErrorDetail } from './errors';
export type { AzureResourceManagerApis, AzureSubscriptionsApi } from './api';
