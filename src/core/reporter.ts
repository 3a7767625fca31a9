import { APP_NAME, AUTH_TYPE_SSH } from "./const"
import { DeploymentOutcome } from "./deployer"
import { DeploymentErrorDetail } from "./ports"

export type OutputWriter = (line: string) => void

const NOT_REPORTED = "(not reported)"

/**
 * Prints pipeline progress and the final outcome for the operator.
 * Values reported by Azure are printed as is.
 */
export class DeploymentReporter {

    private readonly write: OutputWriter

    constructor(write: OutputWriter = (line) => console.info(line)) {
        this.write = write
    }

    progress(message: string) {
        this.write(`==> ${message}`)
    }

    /**
     * @returns true when the deployment succeeded
     */
    report(outcome: DeploymentOutcome): boolean {
        if (outcome.result.succeeded) {
            this.reportSuccess(outcome)
            return true
        }
        this.reportFailure(outcome)
        return false
    }

    reportSuccess(outcome: DeploymentOutcome) {
        const { config, credential, result } = outcome
        const vmName = result.outputs?.vmName ?? config.vmName
        const adminUsername = result.outputs?.adminUsername ?? config.adminUsername
        const publicIp = result.outputs?.publicIpAddress ?? NOT_REPORTED
        const fqdn = result.outputs?.fqdn ?? NOT_REPORTED

        this.write("")
        this.write(`Deployment ${result.deploymentName}: ${result.provisioningState}`)
        this.write(`  VM name:     ${vmName}`)
        this.write(`  Admin user:  ${adminUsername}`)
        this.write(`  Public IP:   ${publicIp}`)
        this.write(`  FQDN:        ${fqdn}`)
        this.write("")

        this.write("Connect with SSH:")
        if (credential.type === AUTH_TYPE_SSH) {
            this.write(`  ssh -i ${credential.privateKeyPath} ${adminUsername}@${publicIp}`)
        } else {
            const sshCommand = result.outputs?.sshCommand ?? `ssh ${adminUsername}@${publicIp}`
            this.write(`  ${sshCommand}`)
            this.write("  Log in with the admin password set for this deployment.")
        }
        this.write("")

        this.write("Use the VM as a remote Docker engine:")
        if (credential.type === AUTH_TYPE_SSH) {
            this.write(`  ssh-add ${credential.privateKeyPath}`)
        }
        this.write(`  docker context create ${vmName} --docker "host=ssh://${adminUsername}@${fqdn}"`)
        this.write(`  docker context use ${vmName}`)
        this.write("")
        this.write("Docker is installed by a script running after deployment, it may need a few more minutes.")
    }

    reportFailure(outcome: DeploymentOutcome) {
        const { config, result } = outcome

        this.write("")
        this.write(`Deployment ${result.deploymentName} failed: ${result.provisioningState}`)
        if (result.error) {
            for (const line of formatErrorDetail(result.error, 1)) {
                this.write(line)
            }
        }
        this.write("")
        this.write(`Resources already created remain in resource group ${config.resourceGroupName}. Remove them with:`)
        this.write(`  ${APP_NAME} destroy ${config.resourceGroupName}`)
    }
}

/**
 * One line per error, nested details indented two more spaces per level
 */
export function formatErrorDetail(detail: DeploymentErrorDetail, depth = 0): string[] {
    const indent = "  ".repeat(depth)
    const code = detail.code ? `${detail.code}: ` : ""
    const target = detail.target ? ` (${detail.target})` : ""
    return [
        `${indent}${code}${detail.message}${target}`,
        ...detail.details.flatMap(d => formatErrorDetail(d, depth + 1)),
    ]
}
