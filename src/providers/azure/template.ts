import { SSH_PORT } from "../../core/const"
import { TemplateParameters } from "../../core/ports"

/**
 * Subset of the Azure Resource Manager template language used here
 */
export interface ArmParameter {
    type: "string" | "securestring" | "int" | "bool" | "object" | "array"
    defaultValue?: string | number | boolean
    metadata?: { description: string }
}

export interface ArmResource {
    type: string
    apiVersion: string
    name: string
    location: string
    tags?: Record<string, string>
    sku?: Record<string, string>
    dependsOn?: string[]
    properties: Record<string, unknown>
}

export interface ArmOutput {
    type: "string"
    value: string
}

// Type alias, an interface is not assignable to the SDK Record<string, unknown> template field
export type ArmTemplate = {
    $schema: string
    contentVersion: string
    parameters: Record<keyof TemplateParameters, ArmParameter>
    variables: Record<string, unknown>
    resources: ArmResource[]
    outputs: Record<string, ArmOutput>
}

export type ArmParameterValues = Record<string, { value: string }>

export interface BuildTemplateArgs {
    /** Shell script run once on first boot, embedded base64 encoded */
    bootstrapScript: string
    /** Inbound TCP ports allowed from source address beside SSH */
    openPorts?: number[]
    tags?: Record<string, string>
}

const NETWORK_API_VERSION = "2023-09-01"
const COMPUTE_API_VERSION = "2023-09-01"

export const BOOTSTRAP_EXTENSION_NAME = "docker-bootstrap"
export const VNET_ADDRESS_PREFIX = "10.0.0.0/16"
export const SUBNET_ADDRESS_PREFIX = "10.0.0.0/24"
const SSH_RULE_PRIORITY = 1000

export const UBUNTU_IMAGE_REFERENCE = {
    publisher: "Canonical",
    offer: "0001-com-ubuntu-server-jammy",
    sku: "22_04-lts-gen2",
    version: "latest",
} as const

const param = (name: keyof TemplateParameters) => `parameters('${name}')`
const expr = (expression: string) => `[${expression}]`
const resourceIdOf = (type: string, name: keyof TemplateParameters) => `resourceId('${type}', ${param(name)})`

const NSG_TYPE = "Microsoft.Network/networkSecurityGroups"
const PUBLIC_IP_TYPE = "Microsoft.Network/publicIPAddresses"
const VNET_TYPE = "Microsoft.Network/virtualNetworks"
const NIC_TYPE = "Microsoft.Network/networkInterfaces"
const VM_TYPE = "Microsoft.Compute/virtualMachines"

const PUBLIC_IP_REFERENCE = `reference(${resourceIdOf(PUBLIC_IP_TYPE, "publicIpName")})`

function inboundRule(name: string, port: number, priority: number) {
    return {
        name: name,
        properties: {
            priority: priority,
            protocol: "Tcp",
            access: "Allow",
            direction: "Inbound",
            sourceAddressPrefix: expr(param("sourceMyIpAddress")),
            sourcePortRange: "*",
            destinationAddressPrefix: "*",
            destinationPortRange: String(port),
        },
    }
}

/**
 * Build the template deploying, in dependency order:
 * NSG, then public IP and virtual network, then NIC, then VM, then the bootstrap extension.
 * VM login uses the SSH key when adminSshPublicKey is non-empty, the password otherwise.
 */
export function buildDeploymentTemplate(args: BuildTemplateArgs): ArmTemplate {
    const tags = args.tags ?? {}
    const location = expr(param("location"))
    const extraPorts = (args.openPorts ?? []).filter(port => port !== SSH_PORT)

    const securityRules = [
        inboundRule("allow-ssh", SSH_PORT, SSH_RULE_PRIORITY),
        ...extraPorts.map((port, i) => inboundRule(`allow-tcp-${port}`, port, SSH_RULE_PRIORITY + 10 * (i + 1))),
    ]

    return {
        $schema: "https://schema.management.azure.com/schemas/2019-04-01/deploymentTemplate.json#",
        contentVersion: "1.0.0.0",
        parameters: {
            location: { type: "string", metadata: { description: "Location of all resources" } },
            vmName: { type: "string" },
            vmSize: { type: "string" },
            adminUsername: { type: "string" },
            adminPassword: { type: "securestring", defaultValue: "", metadata: { description: "Used only when adminSshPublicKey is empty" } },
            adminSshPublicKey: { type: "string", defaultValue: "" },
            sourceMyIpAddress: { type: "string", metadata: { description: "Address or CIDR block allowed inbound" } },
            vnetName: { type: "string" },
            subnetName: { type: "string" },
            publicIpName: { type: "string" },
            nsgName: { type: "string" },
            nicName: { type: "string" },
        },
        variables: {
            sshLinuxConfiguration: {
                disablePasswordAuthentication: true,
                ssh: {
                    publicKeys: [{
                        path: expr(`format('/home/{0}/.ssh/authorized_keys', ${param("adminUsername")})`),
                        keyData: expr(param("adminSshPublicKey")),
                    }],
                },
            },
            passwordLinuxConfiguration: {
                disablePasswordAuthentication: false,
            },
        },
        resources: [
            {
                type: NSG_TYPE,
                apiVersion: NETWORK_API_VERSION,
                name: expr(param("nsgName")),
                location: location,
                tags: tags,
                properties: { securityRules: securityRules },
            },
            {
                type: PUBLIC_IP_TYPE,
                apiVersion: NETWORK_API_VERSION,
                name: expr(param("publicIpName")),
                location: location,
                tags: tags,
                sku: { name: "Standard" },
                dependsOn: [expr(resourceIdOf(NSG_TYPE, "nsgName"))],
                properties: {
                    publicIPAllocationMethod: "Static",
                    dnsSettings: {
                        domainNameLabel: expr(`toLower(format('{0}-{1}', ${param("vmName")}, uniqueString(resourceGroup().id)))`),
                    },
                },
            },
            {
                type: VNET_TYPE,
                apiVersion: NETWORK_API_VERSION,
                name: expr(param("vnetName")),
                location: location,
                tags: tags,
                dependsOn: [expr(resourceIdOf(NSG_TYPE, "nsgName"))],
                properties: {
                    addressSpace: { addressPrefixes: [VNET_ADDRESS_PREFIX] },
                    subnets: [{
                        name: expr(param("subnetName")),
                        properties: {
                            addressPrefix: SUBNET_ADDRESS_PREFIX,
                            networkSecurityGroup: { id: expr(resourceIdOf(NSG_TYPE, "nsgName")) },
                        },
                    }],
                },
            },
            {
                type: NIC_TYPE,
                apiVersion: NETWORK_API_VERSION,
                name: expr(param("nicName")),
                location: location,
                tags: tags,
                dependsOn: [
                    expr(resourceIdOf(PUBLIC_IP_TYPE, "publicIpName")),
                    expr(resourceIdOf(VNET_TYPE, "vnetName")),
                    expr(resourceIdOf(NSG_TYPE, "nsgName")),
                ],
                properties: {
                    networkSecurityGroup: { id: expr(resourceIdOf(NSG_TYPE, "nsgName")) },
                    ipConfigurations: [{
                        name: "ipconfig1",
                        properties: {
                            privateIPAllocationMethod: "Dynamic",
                            publicIPAddress: { id: expr(resourceIdOf(PUBLIC_IP_TYPE, "publicIpName")) },
                            subnet: {
                                id: expr(`resourceId('Microsoft.Network/virtualNetworks/subnets', ${param("vnetName")}, ${param("subnetName")})`),
                            },
                        },
                    }],
                },
            },
            {
                type: VM_TYPE,
                apiVersion: COMPUTE_API_VERSION,
                name: expr(param("vmName")),
                location: location,
                tags: tags,
                dependsOn: [expr(resourceIdOf(NIC_TYPE, "nicName"))],
                properties: {
                    hardwareProfile: { vmSize: expr(param("vmSize")) },
                    osProfile: {
                        computerName: expr(param("vmName")),
                        adminUsername: expr(param("adminUsername")),
                        adminPassword: expr(`if(empty(${param("adminSshPublicKey")}), ${param("adminPassword")}, json('null'))`),
                        linuxConfiguration: expr(`if(empty(${param("adminSshPublicKey")}), variables('passwordLinuxConfiguration'), variables('sshLinuxConfiguration'))`),
                    },
                    storageProfile: {
                        imageReference: UBUNTU_IMAGE_REFERENCE,
                        osDisk: {
                            createOption: "FromImage",
                            managedDisk: { storageAccountType: "StandardSSD_LRS" },
                        },
                    },
                    networkProfile: {
                        networkInterfaces: [{ id: expr(resourceIdOf(NIC_TYPE, "nicName")) }],
                    },
                },
            },
            {
                type: "Microsoft.Compute/virtualMachines/extensions",
                apiVersion: COMPUTE_API_VERSION,
                name: expr(`format('{0}/{1}', ${param("vmName")}, '${BOOTSTRAP_EXTENSION_NAME}')`),
                location: location,
                tags: tags,
                dependsOn: [expr(resourceIdOf(VM_TYPE, "vmName"))],
                properties: {
                    publisher: "Microsoft.Azure.Extensions",
                    type: "CustomScript",
                    typeHandlerVersion: "2.1",
                    autoUpgradeMinorVersion: true,
                    protectedSettings: {
                        script: Buffer.from(args.bootstrapScript, "utf-8").toString("base64"),
                    },
                },
            },
        ],
        outputs: {
            vmName: { type: "string", value: expr(param("vmName")) },
            adminUsername: { type: "string", value: expr(param("adminUsername")) },
            publicIpAddress: { type: "string", value: expr(`${PUBLIC_IP_REFERENCE}.ipAddress`) },
            fqdn: { type: "string", value: expr(`${PUBLIC_IP_REFERENCE}.dnsSettings.fqdn`) },
            sshCommand: {
                type: "string",
                value: expr(`format('ssh {0}@{1}', ${param("adminUsername")}, ${PUBLIC_IP_REFERENCE}.dnsSettings.fqdn)`),
            },
        },
    }
}

/**
 * Wrap parameters the way deployment API expects, leaving out unset ones
 */
export function toArmParameterValues(parameters: TemplateParameters): ArmParameterValues {
    const values: ArmParameterValues = {}
    for (const [name, value] of Object.entries(parameters)) {
        if (isTemplateParameterName(name) && typeof value === "string") {
            values[name] = { value: value }
        }
    }
    return values
}

export const TEMPLATE_PARAMETER_NAMES: readonly (keyof TemplateParameters)[] = [
    "location", "vmName", "vmSize", "adminUsername", "adminPassword", "adminSshPublicKey",
    "sourceMyIpAddress", "vnetName", "subnetName", "publicIpName", "nsgName", "nicName",
]

function isTemplateParameterName(name: string): name is keyof TemplateParameters {
    return TEMPLATE_PARAMETER_NAMES.some(n => n === name)
}
