import { Command } from "@commander-js/extra-typings"
import { getLogger, LOG_LEVEL_DEBUG, setLogVerbosity } from "../log/utils"
import { APP_NAME, APP_VERSION, AUTH_TYPE_SSH, SSH_PORT } from "../core/const"
import { loadBootstrapTemplate, renderBootstrapScript } from "../core/bootstrap/script"
import { ConfigLoader } from "../core/config/default"
import { DeploymentConfig } from "../core/config/interface"
import { Deployer } from "../core/deployer"
import { isDockerVmError } from "../core/errors/taxonomy"
import { DeploymentProviderClient, KeyPairGenerator, OperatorPrompter, PublicIpFetcher } from "../core/ports"
import { DeploymentReporter, OutputWriter } from "../core/reporter"
import { AzureProviderClient } from "../providers/azure/sdk-client"
import { AzureSession } from "../providers/azure/session"
import { buildDeploymentTemplate } from "../providers/azure/template"
import { ErrorUtils } from "../tools/error-utils"
import {
    buildConfigOverrides, CLI_OPTION_ADMIN_USERNAME, CLI_OPTION_AUTH_TYPE, CLI_OPTION_CONFIG_FILE,
    CLI_OPTION_DEPLOYMENT_NAME, CLI_OPTION_IP_ECHO_URL, CLI_OPTION_LOCATION, CLI_OPTION_OPEN_PORT,
    CLI_OPTION_PASSWORD, CLI_OPTION_POLL_INTERVAL, CLI_OPTION_RESOURCE_GROUP, CLI_OPTION_SOURCE_ADDRESS,
    CLI_OPTION_SSH_KEY, CLI_OPTION_SUBSCRIPTION, CLI_OPTION_TAG, CLI_OPTION_TIMEOUT, CLI_OPTION_VERBOSE,
    CLI_OPTION_VM_NAME, CLI_OPTION_VM_SIZE, CLI_OPTION_YES, DeployCliArgs,
} from "./command"
import { InquirerOperatorPrompter } from "./prompter"

const logger = getLogger("program")

export interface CliDependencies {
    prompter: OperatorPrompter
    createProvider: (args: { subscriptionId?: string, prompter: OperatorPrompter }) => DeploymentProviderClient
    /** Operator facing output */
    out: OutputWriter
    /** Error output */
    err: OutputWriter
    env: NodeJS.ProcessEnv
    ipFetcher?: PublicIpFetcher
    keyGenerator?: KeyPairGenerator
}

export function defaultCliDependencies(): CliDependencies {
    return {
        prompter: new InquirerOperatorPrompter(),
        createProvider: (args) => new AzureProviderClient({
            session: new AzureSession({ prompter: args.prompter, subscriptionId: args.subscriptionId }),
        }),
        out: (line) => console.info(line),
        err: (line) => console.error(line),
        env: process.env,
    }
}

/**
 * Log error with its whole cause chain, structured details and stacks at debug level
 */
export function logFullError(error: unknown) {
    for (const [i, e] of ErrorUtils.causeChain(error).entries()) {
        const prefix = i === 0 ? "Error" : "Caused by"
        logger.error(`${prefix}: ${ErrorUtils.extractErrorMessage(e)}`)
        if (isDockerVmError(e)) {
            logger.debug(`Details: ${JSON.stringify(e.toJSON())}`)
        }
        if (e instanceof Error && e.stack) {
            logger.debug(e.stack)
        }
    }
}

/**
 * Outcome of a CLI run: exit code set by the last action
 */
interface RunState {
    exitCode: number
}

export function buildProgram(deps: CliDependencies, state: RunState = { exitCode: 0 }) {
    const program = new Command()
        .name(APP_NAME)
        .description("Deploy an Azure Linux VM running Docker and use it as a remote Docker engine")
        .version(APP_VERSION)
        .showHelpAfterError()

    program.command("deploy", { isDefault: true })
        .description("Deploy the VM and print connection commands")
        .addOption(CLI_OPTION_CONFIG_FILE)
        .addOption(CLI_OPTION_SUBSCRIPTION)
        .addOption(CLI_OPTION_RESOURCE_GROUP)
        .addOption(CLI_OPTION_LOCATION)
        .addOption(CLI_OPTION_DEPLOYMENT_NAME)
        .addOption(CLI_OPTION_VM_NAME)
        .addOption(CLI_OPTION_VM_SIZE)
        .addOption(CLI_OPTION_ADMIN_USERNAME)
        .addOption(CLI_OPTION_AUTH_TYPE)
        .addOption(CLI_OPTION_SSH_KEY)
        .addOption(CLI_OPTION_PASSWORD)
        .addOption(CLI_OPTION_SOURCE_ADDRESS)
        .addOption(CLI_OPTION_OPEN_PORT)
        .addOption(CLI_OPTION_IP_ECHO_URL)
        .addOption(CLI_OPTION_TIMEOUT)
        .addOption(CLI_OPTION_POLL_INTERVAL)
        .addOption(CLI_OPTION_TAG)
        .addOption(CLI_OPTION_YES)
        .addOption(CLI_OPTION_VERBOSE)
        .action(async (cliArgs) => {
            state.exitCode = await runDeploy(deps, cliArgs)
        })

    program.command("template")
        .description("Print the ARM template that would be deployed, without contacting Azure")
        .addOption(CLI_OPTION_CONFIG_FILE)
        .addOption(CLI_OPTION_VM_NAME)
        .addOption(CLI_OPTION_ADMIN_USERNAME)
        .addOption(CLI_OPTION_AUTH_TYPE)
        .addOption(CLI_OPTION_SSH_KEY)
        .addOption(CLI_OPTION_PASSWORD)
        .addOption(CLI_OPTION_OPEN_PORT)
        .addOption(CLI_OPTION_TAG)
        .option('--bootstrap-script', 'Print the rendered bootstrap script instead')
        .addOption(CLI_OPTION_VERBOSE)
        .action((cliArgs) => {
            state.exitCode = runGuarded(deps, () => {
                applyVerbosity(cliArgs.verbose)
                const config = loadConfig(deps, cliArgs)
                const script = renderBootstrapScript(loadBootstrapTemplate(), {
                    adminUsername: config.adminUsername,
                    sshKeyConfigured: config.auth.type === AUTH_TYPE_SSH,
                })
                if (cliArgs.bootstrapScript) {
                    deps.out(script)
                    return 0
                }
                const template = buildDeploymentTemplate({ bootstrapScript: script, openPorts: config.openPorts, tags: config.tags })
                deps.out(JSON.stringify(template, null, 2))
                return 0
            })
        })

    program.command("destroy")
        .description("Delete a resource group and every resource in it")
        .argument("<resource-group>", "Resource group to delete")
        .addOption(CLI_OPTION_SUBSCRIPTION)
        .addOption(CLI_OPTION_YES)
        .addOption(CLI_OPTION_VERBOSE)
        .action(async (resourceGroup, cliArgs) => {
            state.exitCode = await runDestroy(deps, resourceGroup, cliArgs)
        })

    return program
}

/**
 * Parse arguments (without node and script path) and run the matching command
 * @returns process exit code
 */
export async function runCli(argv: string[], deps: CliDependencies = defaultCliDependencies()): Promise<number> {
    const state: RunState = { exitCode: 0 }
    await buildProgram(deps, state).parseAsync(argv, { from: "user" })
    return state.exitCode
}

async function runDeploy(deps: CliDependencies, cliArgs: DeployCliArgs): Promise<number> {
    let config: DeploymentConfig | undefined
    try {
        applyVerbosity(cliArgs.verbose)
        config = loadConfig(deps, cliArgs)

        if (!cliArgs.yes) {
            printPlan(deps.out, config)
            const confirmed = await deps.prompter.confirm({ message: "Deploy?", default: true })
            if (!confirmed) {
                deps.out("Deployment cancelled.")
                return 0
            }
        }

        const reporter = new DeploymentReporter(deps.out)
        const outcome = await new Deployer({
            provider: deps.createProvider({ subscriptionId: config.subscriptionId, prompter: deps.prompter }),
            prompter: deps.prompter,
            ipFetcher: deps.ipFetcher,
            keyGenerator: deps.keyGenerator,
            progress: (message) => reporter.progress(message),
        }).deploy(config)

        return reporter.report(outcome) ? 0 : 1
    } catch (error) {
        logFullError(error)
        printFriendlyError(deps.err, error)
        if (config) {
            deps.err("")
            deps.err("Resources may have been partially created. To clean them up, run:")
            deps.err("")
            deps.err(`    ${APP_NAME} destroy ${config.resourceGroupName}`)
        }
        return 1
    }
}

async function runDestroy(deps: CliDependencies, resourceGroup: string, cliArgs: { subscription?: string, yes?: boolean, verbose?: boolean }): Promise<number> {
    try {
        applyVerbosity(cliArgs.verbose)
        const provider = deps.createProvider({
            subscriptionId: cliArgs.subscription ?? deps.env.AZURE_SUBSCRIPTION_ID,
            prompter: deps.prompter,
        })
        await provider.connect()

        if (!cliArgs.yes) {
            const confirmed = await deps.prompter.confirm({
                message: `Delete resource group ${resourceGroup} and ALL resources in it?`,
                default: false,
            })
            if (!confirmed) {
                deps.out("Destroy cancelled.")
                return 0
            }
        }

        deps.out(`Deleting resource group ${resourceGroup}, this may take a few minutes...`)
        await provider.deleteResourceGroup(resourceGroup)
        deps.out(`Resource group ${resourceGroup} deleted.`)
        return 0
    } catch (error) {
        logFullError(error)
        printFriendlyError(deps.err, error)
        return 1
    }
}

function runGuarded(deps: CliDependencies, fn: () => number): number {
    try {
        return fn()
    } catch (error) {
        logFullError(error)
        printFriendlyError(deps.err, error)
        return 1
    }
}

function loadConfig(deps: CliDependencies, cliArgs: DeployCliArgs): DeploymentConfig {
    return new ConfigLoader({ env: deps.env }).load({
        configFile: cliArgs.config,
        overrides: buildConfigOverrides(cliArgs),
    })
}

function applyVerbosity(verbose?: boolean) {
    if (verbose) {
        setLogVerbosity(LOG_LEVEL_DEBUG)
    }
}

function printPlan(out: OutputWriter, config: DeploymentConfig) {
    out("About to deploy:")
    out(`  Resource group:  ${config.resourceGroupName} (${config.location})`)
    out(`  VM:              ${config.vmName} (${config.vmSize})`)
    out(`  Admin user:      ${config.adminUsername}`)
    out(`  Login:           ${config.auth.type === AUTH_TYPE_SSH ? `SSH key ${config.auth.privateKeyPath}` : "password"}`)
    out(`  Allowed source:  ${config.sourceAddress}`)
    out(`  Open ports:      ${[SSH_PORT, ...config.openPorts].join(", ")}`)
}

function printFriendlyError(err: OutputWriter, error: unknown) {
    err("")
    err(`Error: ${ErrorUtils.extractErrorMessage(error)}`)
    if (isDockerVmError(error)) {
        for (const suggestion of error.suggestions) {
            err(`  Hint: ${suggestion}`)
        }
        if (error.docsUrl) {
            err(`  See: ${error.docsUrl}`)
        }
    }
}
