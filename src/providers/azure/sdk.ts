import { ResourceManagementClient } from "@azure/arm-resources"
import { SubscriptionClient } from "@azure/arm-resources-subscriptions"
import { DefaultAzureCredential, DeviceCodeCredential, TokenCredential } from "@azure/identity"
import { AzureResourceManagerApis, AzureSubscriptionsApi } from "./api"

export function createResourceManagerApis(credential: TokenCredential, subscriptionId: string): AzureResourceManagerApis {
    const client = new ResourceManagementClient(credential, subscriptionId)
    return {
        resourceGroups: client.resourceGroups,
        deployments: client.deployments,
        deploymentOperations: client.deploymentOperations,
    }
}

export function createSubscriptionsApi(credential: TokenCredential): AzureSubscriptionsApi {
    return new SubscriptionClient(credential).subscriptions
}

/**
 * Environment, workload identity, managed identity, Azure CLI...
 */
export function createAmbientCredential(): TokenCredential {
    return new DefaultAzureCredential()
}

export function createDeviceCodeCredential(notify: (message: string) => void): TokenCredential {
    return new DeviceCodeCredential({
        userPromptCallback: (info) => notify(info.message),
    })
}
