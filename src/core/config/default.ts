import * as fs from "node:fs"
import lodash from "lodash"
import { PartialDeep } from "type-fest"
import { getLogger } from "../../log/utils"
import {
    DEFAULT_ADMIN_USERNAME, DEFAULT_IP_ECHO_URL, DEFAULT_LOCATION, DEFAULT_POLL_INTERVAL_SECONDS,
    DEFAULT_RESOURCE_GROUP_NAME, DEFAULT_SSH_PRIVATE_KEY_PATH, DEFAULT_VM_NAME, DEFAULT_VM_SIZE,
    AUTH_TYPE_PASSWORD, AUTH_TYPE_SSH, SOURCE_ADDRESS_AUTO, APP_NAME, RESOURCE_TAG_MANAGED_BY,
} from "../const"
import { DeploymentConfig, DeploymentConfigInput, DeploymentConfigSchema } from "./interface"
import { ERROR_CODES } from "../errors/codes"
import { createError } from "../errors/taxonomy"
import { formatErrorsForCLI, mapValidationError } from "../validation/error-mapping"
import { ErrorUtils } from "../../tools/error-utils"
import { redactSecrets } from "./redact"
import { isRecord } from "../types"

export type DeploymentConfigOverrides = PartialDeep<DeploymentConfigInput>

/**
 * Defaults for every required configuration value. Auth defaults to an SSH key under ~/.ssh.
 */
export const DEFAULT_DEPLOYMENT_CONFIG: DeploymentConfigInput = {
    resourceGroupName: DEFAULT_RESOURCE_GROUP_NAME,
    location: DEFAULT_LOCATION,
    vmName: DEFAULT_VM_NAME,
    vmSize: DEFAULT_VM_SIZE,
    adminUsername: DEFAULT_ADMIN_USERNAME,
    auth: {
        type: AUTH_TYPE_SSH,
    },
    sourceAddress: SOURCE_ADDRESS_AUTO,
    network: {},
    openPorts: [],
    ipEchoUrl: DEFAULT_IP_ECHO_URL,
    pollIntervalSeconds: DEFAULT_POLL_INTERVAL_SECONDS,
    tags: {
        [RESOURCE_TAG_MANAGED_BY]: APP_NAME,
    },
}

/**
 * Environment variables read by the loader, mapped to their config path
 */
export const CONFIG_ENV_VARS = {
    AZURE_SUBSCRIPTION_ID: "subscriptionId",
    AZURE_DOCKER_VM_RESOURCE_GROUP: "resourceGroupName",
    AZURE_DOCKER_VM_LOCATION: "location",
    AZURE_DOCKER_VM_DEPLOYMENT_NAME: "deploymentName",
    AZURE_DOCKER_VM_VM_NAME: "vmName",
    AZURE_DOCKER_VM_VM_SIZE: "vmSize",
    AZURE_DOCKER_VM_ADMIN_USERNAME: "adminUsername",
    AZURE_DOCKER_VM_AUTH_TYPE: "auth.type",
    AZURE_DOCKER_VM_SSH_KEY_PATH: "auth.privateKeyPath",
    AZURE_DOCKER_VM_ADMIN_PASSWORD: "auth.password",
    AZURE_DOCKER_VM_SOURCE_ADDRESS: "sourceAddress",
    AZURE_DOCKER_VM_IP_ECHO_URL: "ipEchoUrl",
    AZURE_DOCKER_VM_DEPLOYMENT_TIMEOUT: "deploymentTimeoutSeconds",
} as const

const NUMERIC_CONFIG_PATHS: readonly string[] = ["deploymentTimeoutSeconds"]

export interface ConfigLoaderArgs {
    env?: NodeJS.ProcessEnv
}

export interface LoadConfigArgs {
    /** JSON file with the same shape as configuration */
    configFile?: string
    /** Highest precedence, usually from CLI flags */
    overrides?: DeploymentConfigOverrides
}

/**
 * Builds the deployment configuration. Precedence, lowest first: defaults, config file, environment, overrides.
 */
export class ConfigLoader {

    private readonly logger = getLogger(ConfigLoader.name)
    private readonly env: NodeJS.ProcessEnv

    constructor(args: ConfigLoaderArgs = {}) {
        this.env = args.env ?? process.env
    }

    load(args: LoadConfigArgs = {}): DeploymentConfig {
        const fromFile = args.configFile ? this.loadFile(args.configFile) : {}
        const fromEnv = this.loadEnv()

        const merged: Record<string, unknown> = lodash.mergeWith(
            {},
            DEFAULT_DEPLOYMENT_CONFIG,
            fromFile,
            fromEnv,
            args.overrides ?? {},
            (_objValue: unknown, srcValue: unknown) => Array.isArray(srcValue) ? srcValue : undefined
        )

        const auth = merged.auth
        if (isRecord(auth)) {
            // A password from any source selects password auth unless a source chose the type
            const typeChosen = [fromFile, fromEnv, args.overrides ?? {}].some(source => lodash.get(source, "auth.type") !== undefined)
            if (!typeChosen && auth.password !== undefined) {
                auth.type = AUTH_TYPE_PASSWORD
            }
            // Default key path only makes sense with SSH auth, adding it to password auth would be rejected
            if (auth.type === AUTH_TYPE_SSH && auth.privateKeyPath === undefined) {
                auth.privateKeyPath = DEFAULT_SSH_PRIVATE_KEY_PATH
            }
        }

        this.logger.debug(`Merged configuration: ${JSON.stringify(redactSecrets(merged))}`)

        return this.parse(merged)
    }

    parse(raw: unknown): DeploymentConfig {
        const result = DeploymentConfigSchema.safeParse(raw)
        if (!result.success) {
            throw createError(ERROR_CODES.CONFIG_INVALID, {
                message: formatErrorsForCLI(mapValidationError(result.error)),
                context: { issues: result.error.issues },
            })
        }
        return result.data
    }

    loadFile(filePath: string): Record<string, unknown> {
        try {
            const content = fs.readFileSync(filePath, "utf-8")
            const parsed: unknown = JSON.parse(content)
            if (!isRecord(parsed)) {
                throw new Error("Top-level JSON value must be an object")
            }
            this.logger.debug(`Loaded configuration file ${filePath}`)
            return parsed
        } catch (error) {
            throw createError(ERROR_CODES.CONFIG_FILE_UNREADABLE, {
                message: `Could not load configuration file ${filePath}: ${ErrorUtils.extractErrorMessage(error)}`,
                context: { filePath },
                cause: error,
            })
        }
    }

    loadEnv(): Record<string, unknown> {
        const result: Record<string, unknown> = {}
        for (const [envVar, configPath] of Object.entries(CONFIG_ENV_VARS)) {
            const value = this.env[envVar]
            if (value === undefined || value === "") {
                continue
            }
            lodash.set(result, configPath, NUMERIC_CONFIG_PATHS.includes(configPath) ? Number(value) : value)
        }
        return result
    }
}
