import type { Deployment, DeploymentExtended, DeploymentOperation, ResourceGroup } from "@azure/arm-resources"
import type { Subscription } from "@azure/arm-resources-subscriptions"
import type { TokenCredential } from "@azure/identity"

/*
 * Narrow views over the Azure SDK clients, the parts this tool calls.
 * The real SDK operation groups satisfy them structurally, tests provide fakes.
 */

export interface AzureResourceGroupsApi {
    get(resourceGroupName: string): Promise<ResourceGroup>
    createOrUpdate(resourceGroupName: string, parameters: ResourceGroup): Promise<ResourceGroup>
    beginDeleteAndWait(resourceGroupName: string): Promise<void>
}

export interface AzureDeploymentsApi {
    /** Resolves once Azure accepted the deployment, returns a poller we do not use */
    beginCreateOrUpdate(resourceGroupName: string, deploymentName: string, parameters: Deployment): Promise<unknown>
    get(resourceGroupName: string, deploymentName: string): Promise<DeploymentExtended>
}

export interface AzureDeploymentOperationsApi {
    list(resourceGroupName: string, deploymentName: string): AsyncIterable<DeploymentOperation>
}

export interface AzureResourceManagerApis {
    resourceGroups: AzureResourceGroupsApi
    deployments: AzureDeploymentsApi
    deploymentOperations: AzureDeploymentOperationsApi
}

export interface AzureSubscriptionsApi {
    list(): AsyncIterable<Subscription>
}

export type ResourceManagerApisFactory = (credential: TokenCredential, subscriptionId: string) => AzureResourceManagerApis

export type SubscriptionsApiFactory = (credential: TokenCredential) => AzureSubscriptionsApi
