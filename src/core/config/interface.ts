import { z } from "zod"
import * as os from "node:os"
import * as path from "node:path"
import { CoreValidators } from "../validation/patterns"
import { AdminUsername, CoreBrandedTypeCreators, SourceAddress } from "../types/branded"
import { AUTH_TYPE_PASSWORD, AUTH_TYPE_SSH, NETWORK_NAME_SUFFIXES, SOURCE_ADDRESS_AUTO } from "../const"

const ResourceNameSchema = z.string()
    .refine(CoreValidators.isValidResourceName, { message: "Invalid Azure resource name" })

/**
 * Raw configuration as merged from defaults, config file, environment and CLI flags
 */
export const DeploymentConfigInputSchema = z.object({
    subscriptionId: z.string().uuid().optional()
        .describe("Azure subscription ID. Resolved interactively when omitted."),
    resourceGroupName: z.string()
        .describe("Resource group holding all deployed resources")
        .refine(CoreValidators.isValidResourceGroupName, { message: "Invalid resource group name" }),
    location: z.string()
        .describe("Azure location, eg. westeurope")
        .refine(CoreValidators.isValidLocation, { message: "Invalid Azure location" }),
    deploymentName: ResourceNameSchema.optional()
        .describe("ARM deployment name. Defaults to '<vmName>-deployment'."),
    vmName: z.string()
        .describe("Virtual machine name")
        .refine(CoreValidators.isValidVmName, { message: "Invalid VM name" }),
    vmSize: z.string().min(1).describe("Virtual machine size, eg. Standard_B2s"),
    adminUsername: z.string()
        .describe("VM administrator user name")
        .refine(CoreValidators.isValidAdminUsername, { message: "Invalid or reserved admin username" }),
    auth: z.object({
        type: z.enum([AUTH_TYPE_SSH, AUTH_TYPE_PASSWORD]),
        privateKeyPath: z.string().min(1).optional(),
        password: z.string().optional(),
    }).strict(),
    sourceAddress: z.string()
        .describe(`Firewall source: '${SOURCE_ADDRESS_AUTO}', an IPv4 address or an IPv4 CIDR block`)
        .refine(v => v === SOURCE_ADDRESS_AUTO || CoreValidators.isValidSourceAddress(v), {
            message: "Invalid source address"
        }),
    network: z.object({
        vnetName: ResourceNameSchema.optional(),
        subnetName: ResourceNameSchema.optional(),
        publicIpName: ResourceNameSchema.optional(),
        nsgName: ResourceNameSchema.optional(),
        nicName: ResourceNameSchema.optional(),
    }).strict().default({}),
    openPorts: z.array(z.number().int().min(1).max(65535)).default([])
        .describe("Additional inbound TCP ports opened to source address"),
    ipEchoUrl: z.string().url().describe("Plain text endpoint returning caller public IP"),
    deploymentTimeoutSeconds: z.number().int().positive().optional()
        .describe("Give up waiting for deployment after this delay. No timeout when unset."),
    pollIntervalSeconds: z.number().positive()
        .describe("Delay between deployment status checks"),
    tags: z.record(z.string()).default({}),
})

export type DeploymentConfigInput = z.input<typeof DeploymentConfigInputSchema>

export interface SshAuthConfig {
    type: typeof AUTH_TYPE_SSH
    /** Public key is expected at the same path with .pub suffix */
    privateKeyPath: string
}

export interface PasswordAuthConfig {
    type: typeof AUTH_TYPE_PASSWORD
    /** Prompted when unset */
    password?: string
}

export type AuthConfig = SshAuthConfig | PasswordAuthConfig

export interface NetworkNames {
    vnetName: string
    subnetName: string
    publicIpName: string
    nsgName: string
    nicName: string
}

/**
 * Validated configuration for a single deployment run
 */
export interface DeploymentConfig {
    subscriptionId?: string
    resourceGroupName: string
    location: string
    deploymentName: string
    vmName: string
    vmSize: string
    adminUsername: AdminUsername
    auth: AuthConfig
    sourceAddress: SourceAddress | typeof SOURCE_ADDRESS_AUTO
    network: NetworkNames
    openPorts: number[]
    ipEchoUrl: string
    deploymentTimeoutSeconds?: number
    pollIntervalSeconds: number
    tags: Record<string, string>
}

export function expandHomeDir(filePath: string): string {
    if (filePath === "~") {
        return os.homedir()
    }
    if (filePath.startsWith("~/")) {
        return path.join(os.homedir(), filePath.slice(2))
    }
    return filePath
}

export const DeploymentConfigSchema = DeploymentConfigInputSchema
    .superRefine((val, ctx) => {
        if (val.auth.type === AUTH_TYPE_SSH && val.auth.password !== undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "A password cannot be combined with SSH key authentication",
                path: ["auth", "password"],
            })
        }
        if (val.auth.type === AUTH_TYPE_SSH && val.auth.privateKeyPath === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "SSH key authentication requires a private key path",
                path: ["auth", "privateKeyPath"],
            })
        }
        if (val.auth.type === AUTH_TYPE_PASSWORD && val.auth.privateKeyPath !== undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "An SSH key path cannot be combined with password authentication",
                path: ["auth", "privateKeyPath"],
            })
        }
        if (val.auth.type === AUTH_TYPE_PASSWORD && val.auth.password !== undefined
            && !CoreValidators.isValidAdminPassword(val.auth.password)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "Password does not meet Azure complexity requirements",
                path: ["auth", "password"],
                params: { suggestion: "Use 12 to 123 chars with 3 of: lowercase, uppercase, digit, special char" },
            })
        }
    })
    .transform((val): DeploymentConfig => {
        const auth: AuthConfig = val.auth.type === AUTH_TYPE_SSH
            ? { type: AUTH_TYPE_SSH, privateKeyPath: expandHomeDir(val.auth.privateKeyPath ?? "") }
            : { type: AUTH_TYPE_PASSWORD, password: val.auth.password }

        const sourceAddress = val.sourceAddress === SOURCE_ADDRESS_AUTO
            ? SOURCE_ADDRESS_AUTO
            : CoreBrandedTypeCreators.createSourceAddress(val.sourceAddress)

        return {
            subscriptionId: val.subscriptionId,
            resourceGroupName: val.resourceGroupName,
            location: val.location,
            deploymentName: val.deploymentName ?? `${val.vmName}-deployment`,
            vmName: val.vmName,
            vmSize: val.vmSize,
            adminUsername: CoreBrandedTypeCreators.createAdminUsername(val.adminUsername),
            auth: auth,
            sourceAddress: sourceAddress,
            network: {
                vnetName: val.network.vnetName ?? `${val.vmName}-${NETWORK_NAME_SUFFIXES.vnetName}`,
                subnetName: val.network.subnetName ?? `${val.vmName}-${NETWORK_NAME_SUFFIXES.subnetName}`,
                publicIpName: val.network.publicIpName ?? `${val.vmName}-${NETWORK_NAME_SUFFIXES.publicIpName}`,
                nsgName: val.network.nsgName ?? `${val.vmName}-${NETWORK_NAME_SUFFIXES.nsgName}`,
                nicName: val.network.nicName ?? `${val.vmName}-${NETWORK_NAME_SUFFIXES.nicName}`,
            },
            openPorts: val.openPorts,
            ipEchoUrl: val.ipEchoUrl,
            deploymentTimeoutSeconds: val.deploymentTimeoutSeconds,
            pollIntervalSeconds: val.pollIntervalSeconds,
            tags: val.tags,
        }
    })
