import { InvalidArgumentError, Option } from "@commander-js/extra-typings"
import { AUTH_TYPE_PASSWORD, AUTH_TYPE_SSH } from "../core/const"
import { DeploymentConfigOverrides } from "../core/config/default"

function parsePositiveInt(value: string): number {
    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`)
    }
    return parsed
}

function parsePositiveNumber(value: string): number {
    const parsed = Number(value)
    if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
        throw new InvalidArgumentError(`Expected a number > 0, got '${value}'`)
    }
    return parsed
}

function collectPort(value: string, previous: number[] | undefined): number[] {
    const port = parsePositiveInt(value)
    if (port > 65535) {
        throw new InvalidArgumentError(`Port out of range: ${port}`)
    }
    return [...(previous ?? []), port]
}

function collectTag(value: string, previous: Record<string, string> | undefined): Record<string, string> {
    const separator = value.indexOf("=")
    if (separator <= 0) {
        throw new InvalidArgumentError(`Expected key=value, got '${value}'`)
    }
    return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) }
}

export const CLI_OPTION_CONFIG_FILE = new Option('--config <file>', 'JSON configuration file')
export const CLI_OPTION_SUBSCRIPTION = new Option('--subscription <id>', 'Azure subscription ID. Resolved interactively when omitted.')
export const CLI_OPTION_RESOURCE_GROUP = new Option('--resource-group <name>', 'Resource group to deploy into, created if missing')
export const CLI_OPTION_LOCATION = new Option('--location <location>', 'Azure location, eg. westeurope')
export const CLI_OPTION_DEPLOYMENT_NAME = new Option('--deployment-name <name>', 'Deployment name. Default: <vm-name>-deployment')
export const CLI_OPTION_VM_NAME = new Option('--vm-name <name>', 'Virtual machine name')
export const CLI_OPTION_VM_SIZE = new Option('--vm-size <size>', 'Virtual machine size, eg. Standard_B2s')
export const CLI_OPTION_ADMIN_USERNAME = new Option('--admin-username <name>', 'VM admin user name')
export const CLI_OPTION_AUTH_TYPE = new Option('--auth-type <type>', 'VM login method').choices([AUTH_TYPE_SSH, AUTH_TYPE_PASSWORD] as const)
export const CLI_OPTION_SSH_KEY = new Option('--ssh-key <path>', 'Private key path, public key expected at <path>.pub. Generated when missing.')
export const CLI_OPTION_PASSWORD = new Option('--password <password>', 'VM admin password. Implies --auth-type password. Prompted when omitted.')
export const CLI_OPTION_SOURCE_ADDRESS = new Option('--source-address <address>', 'Address or CIDR block allowed inbound, or "auto" to detect your public IP')
export const CLI_OPTION_OPEN_PORT = new Option('--open-port <port>', 'Additional inbound TCP port, repeatable').argParser(collectPort)
export const CLI_OPTION_IP_ECHO_URL = new Option('--ip-echo-url <url>', 'Service returning your public IP as plain text')
export const CLI_OPTION_TIMEOUT = new Option('--timeout <seconds>', 'Stop waiting for deployment after this delay').argParser(parsePositiveInt)
export const CLI_OPTION_POLL_INTERVAL = new Option('--poll-interval <seconds>', 'Delay between deployment status checks').argParser(parsePositiveNumber)
export const CLI_OPTION_TAG = new Option('--tag <key=value>', 'Tag applied to created resources, repeatable').argParser(collectTag)
export const CLI_OPTION_YES = new Option('--yes', 'Do not prompt for approval, automatically approve and continue')
export const CLI_OPTION_VERBOSE = new Option('--verbose', 'Show debug logs')

export interface DeployCliArgs {
    config?: string
    subscription?: string
    resourceGroup?: string
    location?: string
    deploymentName?: string
    vmName?: string
    vmSize?: string
    adminUsername?: string
    authType?: typeof AUTH_TYPE_SSH | typeof AUTH_TYPE_PASSWORD
    sshKey?: string
    password?: string
    sourceAddress?: string
    openPort?: number[]
    ipEchoUrl?: string
    timeout?: number
    pollInterval?: number
    tag?: Record<string, string>
    yes?: boolean
    verbose?: boolean
}

/**
 * Translate flags into configuration overrides. A password or key flag
 * selects the matching auth type unless --auth-type says otherwise.
 */
export function buildConfigOverrides(cliArgs: DeployCliArgs): DeploymentConfigOverrides {
    const authType = cliArgs.authType
        ?? (cliArgs.password !== undefined ? AUTH_TYPE_PASSWORD : undefined)
        ?? (cliArgs.sshKey !== undefined ? AUTH_TYPE_SSH : undefined)

    return {
        subscriptionId: cliArgs.subscription,
        resourceGroupName: cliArgs.resourceGroup,
        location: cliArgs.location,
        deploymentName: cliArgs.deploymentName,
        vmName: cliArgs.vmName,
        vmSize: cliArgs.vmSize,
        adminUsername: cliArgs.adminUsername,
        auth: {
            type: authType,
            privateKeyPath: cliArgs.sshKey,
            password: cliArgs.password,
        },
        sourceAddress: cliArgs.sourceAddress,
        openPorts: cliArgs.openPort,
        ipEchoUrl: cliArgs.ipEchoUrl,
        deploymentTimeoutSeconds: cliArgs.timeout,
        pollIntervalSeconds: cliArgs.pollInterval,
        tags: cliArgs.tag,
    }
}
