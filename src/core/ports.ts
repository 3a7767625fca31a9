/**
 * Port interfaces between the deployment pipeline and its collaborators.
 * Production implementations live under providers/ and cli/, tests substitute fakes.
 */

import { AdminUsername, SourceAddress } from "./types/branded"

// ---------- Operator interaction ----------

export interface InputPromptArgs {
    message: string
    default?: string
    /** Return true when valid or an error message to display */
    validate?: (value: string) => boolean | string
}

export interface PasswordPromptArgs {
    message: string
    validate?: (value: string) => boolean | string
}

export interface ConfirmPromptArgs {
    message: string
    default?: boolean
}

export interface SelectChoice<T extends string> {
    name: string
    value: T
}

export interface SelectPromptArgs<T extends string> {
    message: string
    choices: SelectChoice<T>[]
    default?: T
}

/**
 * Asks the operator for values mid-pipeline
 */
export interface OperatorPrompter {
    input(args: InputPromptArgs): Promise<string>
    password(args: PasswordPromptArgs): Promise<string>
    confirm(args: ConfirmPromptArgs): Promise<boolean>
    select<T extends string>(args: SelectPromptArgs<T>): Promise<T>
}

// ---------- Cloud provider ----------

export interface ProviderSession {
    subscriptionId: string
    subscriptionName?: string
    tenantId?: string
}

export interface ResourceGroupInfo {
    name: string
    location: string
    provisioningState?: string
}

/**
 * Parameters handed to the declarative template, with their exact template names.
 * Exactly one of adminPassword or adminSshPublicKey is set, the other key is absent.
 */
export interface TemplateParameters {
    location: string
    vmName: string
    vmSize: string
    adminUsername: AdminUsername
    adminPassword?: string
    adminSshPublicKey?: string
    sourceMyIpAddress: SourceAddress
    vnetName: string
    subnetName: string
    publicIpName: string
    nsgName: string
    nicName: string
}

export interface DeploymentRequest {
    resourceGroupName: string
    deploymentName: string
    parameters: TemplateParameters
    /** Rendered shell script run once on the VM after creation */
    bootstrapScript: string
    /** Inbound TCP ports opened to source address in addition to SSH */
    openPorts: number[]
    tags: Record<string, string>
}

export interface DeploymentHandle {
    resourceGroupName: string
    deploymentName: string
}

export interface WaitForDeploymentOptions {
    /** No timeout when unset */
    timeoutSeconds?: number
    pollIntervalSeconds: number
}

export interface DeploymentOutputs {
    vmName: string
    adminUsername: string
    publicIpAddress: string
    fqdn: string
    sshCommand: string
}

/**
 * Error tree reported by the provider for a failed deployment
 */
export interface DeploymentErrorDetail {
    code?: string
    message: string
    target?: string
    details: DeploymentErrorDetail[]
}

export interface DeploymentResult {
    deploymentName: string
    provisioningState: string
    succeeded: boolean
    outputs?: DeploymentOutputs
    error?: DeploymentErrorDetail
    duration?: string
}

/**
 * Provider operations the pipeline sequences.
 * Implementations block until the provider answers, wait blocks until a terminal state.
 */
export interface DeploymentProviderClient {
    /**
     * Ensure an authenticated session exists and resolve subscription context
     */
    connect(): Promise<ProviderSession>

    /**
     * @returns undefined when no resource group with this name exists
     */
    getResourceGroup(name: string): Promise<ResourceGroupInfo | undefined>

    createResourceGroup(name: string, location: string, tags: Record<string, string>): Promise<ResourceGroupInfo>

    deleteResourceGroup(name: string): Promise<void>

    submitDeployment(request: DeploymentRequest): Promise<DeploymentHandle>

    waitForDeployment(handle: DeploymentHandle, opts: WaitForDeploymentOptions): Promise<DeploymentResult>
}

// ---------- Local collaborators ----------

/**
 * Fetches caller public IP as plain text from an address echo endpoint
 */
export type PublicIpFetcher = (url: string) => Promise<string>

export interface GeneratedKeyPair {
    privateKey: string
    publicKey: string
}

/**
 * Generates an OpenSSH key pair without passphrase
 */
export type KeyPairGenerator = (comment: string) => GeneratedKeyPair
