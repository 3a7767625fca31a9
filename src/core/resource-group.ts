import { getLogger } from "../log/utils"
import { DeploymentProviderClient, ResourceGroupInfo } from "./ports"

const logger = getLogger("ResourceGroup")

export interface EnsureResourceGroupResult {
    resourceGroup: ResourceGroupInfo
    created: boolean
}

/**
 * Create resource group unless it already exists. Existing group is kept as is,
 * even when located elsewhere than requested.
 */
export async function ensureResourceGroup(
    provider: DeploymentProviderClient,
    name: string,
    location: string,
    tags: Record<string, string> = {}
): Promise<EnsureResourceGroupResult> {
    const existing = await provider.getResourceGroup(name)
    if (existing) {
        if (existing.location !== location) {
            logger.warn(`Resource group ${name} already exists in ${existing.location}, resources will still be deployed in ${location}`)
        }
        logger.debug(`Resource group ${name} already exists`)
        return { resourceGroup: existing, created: false }
    }

    logger.info(`Creating resource group ${name} in ${location}`)
    const created = await provider.createResourceGroup(name, location, tags)
    return { resourceGroup: created, created: true }
}
