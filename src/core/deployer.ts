import { getLogger } from "../log/utils"
import { AUTH_TYPE_SSH } from "./const"
import { BootstrapTemplate, loadBootstrapTemplate, renderBootstrapScript } from "./bootstrap/script"
import { DeploymentConfig } from "./config/interface"
import { CredentialPreparer, LoginCredential } from "./credentials"
import { DeploymentRejectedError } from "./errors/deployment"
import { PublicIpResolver } from "./network/public-ip"
import { buildTemplateParameters } from "./parameters"
import {
    DeploymentProviderClient, DeploymentRequest, DeploymentResult, KeyPairGenerator, OperatorPrompter, ProviderSession, PublicIpFetcher,
} from "./ports"
import { ensureResourceGroup } from "./resource-group"
import { SourceAddress } from "./types/branded"

export interface DeployerArgs {
    provider: DeploymentProviderClient
    prompter: OperatorPrompter
    ipFetcher?: PublicIpFetcher
    keyGenerator?: KeyPairGenerator
    /** Loaded from templates/ when unset */
    bootstrapTemplate?: BootstrapTemplate
    /** Receives one human readable line per pipeline step */
    progress?: (message: string) => void
}

export interface DeploymentOutcome {
    config: DeploymentConfig
    session: ProviderSession
    sourceAddress: SourceAddress
    credential: LoginCredential
    resourceGroupCreated: boolean
    result: DeploymentResult
}

/**
 * Runs the provisioning pipeline, each step awaited before the next.
 * A deployment ending in failure is returned as an outcome, other failures are thrown.
 */
export class Deployer {

    private readonly logger = getLogger(Deployer.name)
    private readonly args: DeployerArgs

    constructor(args: DeployerArgs) {
        this.args = args
    }

    async deploy(config: DeploymentConfig): Promise<DeploymentOutcome> {
        const { provider, prompter } = this.args

        this.progress("Connecting to Azure")
        const session = await provider.connect()

        this.progress("Resolving firewall source address")
        const sourceAddress = await new PublicIpResolver({
            prompter: prompter,
            echoUrl: config.ipEchoUrl,
            fetcher: this.args.ipFetcher,
        }).resolve(config.sourceAddress)

        this.progress(config.auth.type === AUTH_TYPE_SSH ? "Preparing SSH key pair" : "Preparing admin password")
        const credential = await new CredentialPreparer({
            prompter: prompter,
            keyGenerator: this.args.keyGenerator,
        }).prepare(config.auth)

        this.progress(`Ensuring resource group ${config.resourceGroupName}`)
        const { created } = await ensureResourceGroup(provider, config.resourceGroupName, config.location, config.tags)

        const template = this.args.bootstrapTemplate ?? loadBootstrapTemplate()
        const bootstrapScript = renderBootstrapScript(template, {
            adminUsername: config.adminUsername,
            sshKeyConfigured: credential.type === AUTH_TYPE_SSH,
        })
        const parameters = buildTemplateParameters(config, credential, sourceAddress)

        this.progress(`Deploying ${config.vmName} (${config.vmSize}) in ${config.location}, this usually takes a few minutes`)
        const result = await this.submitAndWait(config, {
            resourceGroupName: config.resourceGroupName,
            deploymentName: config.deploymentName,
            parameters: parameters,
            bootstrapScript: bootstrapScript,
            openPorts: config.openPorts,
            tags: config.tags,
        })

        return {
            config,
            session,
            sourceAddress,
            credential,
            resourceGroupCreated: created,
            result,
        }
    }

    private async submitAndWait(
        config: DeploymentConfig,
        request: DeploymentRequest
    ): Promise<DeploymentResult> {
        const { provider } = this.args
        try {
            const handle = await provider.submitDeployment(request)
            return await provider.waitForDeployment(handle, {
                timeoutSeconds: config.deploymentTimeoutSeconds,
                pollIntervalSeconds: config.pollIntervalSeconds,
            })
        } catch (error) {
            if (error instanceof DeploymentRejectedError) {
                this.logger.debug(`Deployment ${request.deploymentName} rejected: ${error.message}`)
                return {
                    deploymentName: request.deploymentName,
                    provisioningState: "Rejected",
                    succeeded: false,
                    error: error.detail,
                }
            }
            throw error
        }
    }

    private progress(message: string) {
        this.logger.debug(message)
        this.args.progress?.(message)
    }
}
