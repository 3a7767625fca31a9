export const APP_NAME = "azure-docker-vm"
export const APP_VERSION = "0.1.0"

/**
 * Sentinel value for source address meaning "detect my public IP"
 */
export const SOURCE_ADDRESS_AUTO = "auto"

export const AUTH_TYPE_SSH = "ssh"
export const AUTH_TYPE_PASSWORD = "password"
export type AUTH_TYPE = typeof AUTH_TYPE_SSH | typeof AUTH_TYPE_PASSWORD

export const DEFAULT_LOCATION = "westeurope"
export const DEFAULT_RESOURCE_GROUP_NAME = "docker-vm-rg"
export const DEFAULT_VM_NAME = "docker-vm"
export const DEFAULT_VM_SIZE = "Standard_B2s"
export const DEFAULT_ADMIN_USERNAME = "azureuser"
export const DEFAULT_SSH_PRIVATE_KEY_PATH = "~/.ssh/azure_docker_vm_rsa"
export const DEFAULT_IP_ECHO_URL = "https://api.ipify.org"
export const DEFAULT_POLL_INTERVAL_SECONDS = 10

export const SSH_PORT = 22

/**
 * Suffixes appended to VM name to derive network resource names when not set explicitly
 */
export const NETWORK_NAME_SUFFIXES = {
    vnetName: "vnet",
    subnetName: "subnet",
    publicIpName: "pip",
    nsgName: "nsg",
    nicName: "nic",
} as const

export const RESOURCE_TAG_MANAGED_BY = "managedBy"
