import { AUTH_TYPE_SSH } from "./const"
import { DeploymentConfig } from "./config/interface"
import { LoginCredential } from "./credentials"
import { TemplateParameters } from "./ports"
import { SourceAddress } from "./types/branded"

/**
 * Assemble template parameters. Only the credential in use is set,
 * the other key is left out entirely.
 */
export function buildTemplateParameters(
    config: DeploymentConfig,
    credential: LoginCredential,
    sourceAddress: SourceAddress
): TemplateParameters {
    const base = {
        location: config.location,
        vmName: config.vmName,
        vmSize: config.vmSize,
        adminUsername: config.adminUsername,
        sourceMyIpAddress: sourceAddress,
        vnetName: config.network.vnetName,
        subnetName: config.network.subnetName,
        publicIpName: config.network.publicIpName,
        nsgName: config.network.nsgName,
        nicName: config.network.nicName,
    }

    return credential.type === AUTH_TYPE_SSH
        ? { ...base, adminSshPublicKey: credential.publicKey }
        : { ...base, adminPassword: credential.password }
}
