import type { DeploymentExtended } from "@azure/arm-resources"
import { z } from "zod"
import { getLogger } from "../../log/utils"
import { ERROR_CODES } from "../../core/errors/codes"
import { DeploymentRejectedError } from "../../core/errors/deployment"
import { createError } from "../../core/errors/taxonomy"
import {
    DeploymentErrorDetail, DeploymentHandle, DeploymentOutputs, DeploymentProviderClient, DeploymentRequest,
    DeploymentResult, ProviderSession, ResourceGroupInfo, WaitForDeploymentOptions,
} from "../../core/ports"
import { ErrorUtils } from "../../tools/error-utils"
import { AzureResourceManagerApis, ResourceManagerApisFactory } from "./api"
import { errorDetailFromThrown, toDeploymentErrorDetail } from "./errors"
import { createResourceManagerApis } from "./sdk"
import { AzureSession } from "./session"
import { buildDeploymentTemplate, toArmParameterValues } from "./template"

export enum AzureProvisioningState {
    Succeeded = "Succeeded",
    Failed = "Failed",
    Canceled = "Canceled",
}

const TERMINAL_STATES: readonly string[] = [
    AzureProvisioningState.Succeeded,
    AzureProvisioningState.Failed,
    AzureProvisioningState.Canceled,
]

const OutputValueSchema = z.object({ value: z.string() }).transform(o => o.value)

const DeploymentOutputsSchema = z.object({
    vmName: OutputValueSchema,
    adminUsername: OutputValueSchema,
    publicIpAddress: OutputValueSchema,
    fqdn: OutputValueSchema,
    sshCommand: OutputValueSchema,
})

export interface AzureProviderClientArgs {
    session: AzureSession
    apisFactory?: ResourceManagerApisFactory
    /** Mocked for unit tests */
    sleep?: (ms: number) => Promise<void>
    now?: () => number
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * Deployment provider backed by Azure Resource Manager
 */
export class AzureProviderClient implements DeploymentProviderClient {

    private readonly logger = getLogger(AzureProviderClient.name)
    private readonly session: AzureSession
    private readonly apisFactory: ResourceManagerApisFactory
    private readonly sleep: (ms: number) => Promise<void>
    private readonly now: () => number
    private apis?: AzureResourceManagerApis

    constructor(args: AzureProviderClientArgs) {
        this.session = args.session
        this.apisFactory = args.apisFactory ?? createResourceManagerApis
        this.sleep = args.sleep ?? defaultSleep
        this.now = args.now ?? Date.now
    }

    async connect(): Promise<ProviderSession> {
        const context = await this.session.connect()
        this.apis = this.apisFactory(context.credential, context.session.subscriptionId)
        return context.session
    }

    async getResourceGroup(name: string): Promise<ResourceGroupInfo | undefined> {
        try {
            const group = await this.connected().resourceGroups.get(name)
            return {
                name: group.name ?? name,
                location: group.location,
                provisioningState: group.properties?.provisioningState,
            }
        } catch (error) {
            if (ErrorUtils.isNotFound(error)) {
                return undefined
            }
            throw this.resourceGroupError(`Could not get resource group ${name}`, name, error)
        }
    }

    async createResourceGroup(name: string, location: string, tags: Record<string, string>): Promise<ResourceGroupInfo> {
        try {
            const group = await this.connected().resourceGroups.createOrUpdate(name, { location, tags })
            return {
                name: group.name ?? name,
                location: group.location,
                provisioningState: group.properties?.provisioningState,
            }
        } catch (error) {
            throw this.resourceGroupError(`Could not create resource group ${name} in ${location}`, name, error)
        }
    }

    async deleteResourceGroup(name: string): Promise<void> {
        this.logger.debug(`Deleting resource group ${name}`)
        try {
            await this.connected().resourceGroups.beginDeleteAndWait(name)
        } catch (error) {
            if (ErrorUtils.isNotFound(error)) {
                this.logger.debug(`Resource group ${name} already deleted`)
                return
            }
            throw this.resourceGroupError(`Could not delete resource group ${name}`, name, error)
        }
    }

    async submitDeployment(request: DeploymentRequest): Promise<DeploymentHandle> {
        const template = buildDeploymentTemplate({
            bootstrapScript: request.bootstrapScript,
            openPorts: request.openPorts,
            tags: request.tags,
        })

        this.logger.debug(`Submitting deployment ${request.deploymentName} to resource group ${request.resourceGroupName}`)

        try {
            await this.connected().deployments.beginCreateOrUpdate(request.resourceGroupName, request.deploymentName, {
                properties: {
                    mode: "Incremental",
                    template: template,
                    parameters: toArmParameterValues(request.parameters),
                },
                tags: request.tags,
            })
        } catch (error) {
            throw new DeploymentRejectedError(errorDetailFromThrown(error), {
                context: { resourceGroupName: request.resourceGroupName, deploymentName: request.deploymentName },
                cause: error,
            })
        }

        return { resourceGroupName: request.resourceGroupName, deploymentName: request.deploymentName }
    }

    /**
     * Poll deployment until it reaches Succeeded, Failed or Canceled.
     * @throws DeploymentError with DEPLOYMENT_TIMEOUT code when timeout elapses first
     */
    async waitForDeployment(handle: DeploymentHandle, opts: WaitForDeploymentOptions): Promise<DeploymentResult> {
        const start = this.now()
        const intervalMs = opts.pollIntervalSeconds * 1000
        const timeoutMs = opts.timeoutSeconds === undefined ? undefined : opts.timeoutSeconds * 1000

        while (true) {
            const deployment = await this.connected().deployments.get(handle.resourceGroupName, handle.deploymentName)
            const state = deployment.properties?.provisioningState ?? "Unknown"

            if (TERMINAL_STATES.includes(state)) {
                this.logger.debug(`Deployment ${handle.deploymentName} reached state ${state}`)
                return await this.toDeploymentResult(handle, deployment, state)
            }

            const elapsedMs = this.now() - start
            if (timeoutMs !== undefined && elapsedMs + intervalMs > timeoutMs) {
                throw createError(ERROR_CODES.DEPLOYMENT_TIMEOUT, {
                    message: `Deployment ${handle.deploymentName} still ${state} after ${Math.round(elapsedMs / 1000)} seconds`,
                    context: { ...handle, provisioningState: state },
                })
            }

            this.logger.debug(`Deployment ${handle.deploymentName} is ${state}, waiting ${opts.pollIntervalSeconds}s`)
            await this.sleep(intervalMs)
        }
    }

    private async toDeploymentResult(handle: DeploymentHandle, deployment: DeploymentExtended, state: string): Promise<DeploymentResult> {
        const succeeded = state === AzureProvisioningState.Succeeded
        const result: DeploymentResult = {
            deploymentName: handle.deploymentName,
            provisioningState: state,
            succeeded: succeeded,
            duration: deployment.properties?.duration,
        }

        if (succeeded) {
            result.outputs = this.parseOutputs(deployment.properties?.outputs)
            return result
        }

        const topLevel: DeploymentErrorDetail = deployment.properties?.error
            ? toDeploymentErrorDetail(deployment.properties.error)
            : { message: `Deployment ${handle.deploymentName} ended in state ${state}`, details: [] }

        const failedOperations = await this.listFailedOperations(handle)
        const known = new Set(topLevel.details.map(d => d.message))
        result.error = {
            ...topLevel,
            details: [...topLevel.details, ...failedOperations.filter(d => !known.has(d.message))],
        }
        return result
    }

    private parseOutputs(raw: unknown): DeploymentOutputs | undefined {
        const parsed = DeploymentOutputsSchema.safeParse(raw)
        if (!parsed.success) {
            this.logger.warn(`Deployment outputs missing or malformed: ${parsed.error.message}`)
            return undefined
        }
        return parsed.data
    }

    /**
     * Status messages of failed operations often say more than the deployment error itself
     */
    private async listFailedOperations(handle: DeploymentHandle): Promise<DeploymentErrorDetail[]> {
        const details: DeploymentErrorDetail[] = []
        try {
            for await (const operation of this.connected().deploymentOperations.list(handle.resourceGroupName, handle.deploymentName)) {
                const props = operation.properties
                if (props?.provisioningState !== AzureProvisioningState.Failed) {
                    continue
                }
                const target = props.targetResource
                    ? `${props.targetResource.resourceType ?? ""}/${props.targetResource.resourceName ?? ""}`
                    : undefined
                const statusError = props.statusMessage?.error
                details.push(statusError
                    ? { ...toDeploymentErrorDetail(statusError), target: statusError.target ?? target }
                    : { code: props.statusCode, message: `Operation on ${target ?? "unknown resource"} failed`, target, details: [] })
            }
        } catch (error) {
            this.logger.warn(`Could not list operations of deployment ${handle.deploymentName}: ${ErrorUtils.extractErrorMessage(error)}`)
        }
        return details
    }

    private connected(): AzureResourceManagerApis {
        if (!this.apis) {
            throw createError(ERROR_CODES.PROVIDER_NOT_CONNECTED)
        }
        return this.apis
    }

    private resourceGroupError(message: string, name: string, cause: unknown) {
        return createError(ERROR_CODES.RESOURCE_GROUP_FAILED, {
            message: `${message}: ${ErrorUtils.extractErrorMessage(cause)}`,
            context: { resourceGroupName: name },
            cause: cause,
        })
    }
}
