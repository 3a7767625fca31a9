import { getLogger } from "../../log/utils"
import { SOURCE_ADDRESS_AUTO } from "../const"
import { ERROR_CODES } from "../errors/codes"
import { createError } from "../errors/taxonomy"
import { OperatorPrompter, PublicIpFetcher } from "../ports"
import { CoreBrandedTypeCreators, SourceAddress } from "../types/branded"
import { CoreValidators } from "../validation/patterns"
import { ErrorUtils } from "../../tools/error-utils"

const IP_ECHO_TIMEOUT_MS = 10_000

/**
 * Default fetcher: plain HTTP GET, body is expected to be the address alone
 */
export const fetchPublicIp: PublicIpFetcher = async (url: string): Promise<string> => {
    const response = await fetch(url, { signal: AbortSignal.timeout(IP_ECHO_TIMEOUT_MS) })
    if (!response.ok) {
        throw new Error(`Address echo service ${url} answered HTTP ${response.status}`)
    }
    return await response.text()
}

export interface PublicIpResolverArgs {
    prompter: OperatorPrompter
    echoUrl: string
    fetcher?: PublicIpFetcher
}

/**
 * Resolves the firewall rule source address. Detection failures never abort,
 * they fall back to asking the operator.
 */
export class PublicIpResolver {

    private readonly logger = getLogger(PublicIpResolver.name)
    private readonly prompter: OperatorPrompter
    private readonly echoUrl: string
    private readonly fetcher: PublicIpFetcher

    constructor(args: PublicIpResolverArgs) {
        this.prompter = args.prompter
        this.echoUrl = args.echoUrl
        this.fetcher = args.fetcher ?? fetchPublicIp
    }

    async resolve(configured: SourceAddress | typeof SOURCE_ADDRESS_AUTO): Promise<SourceAddress> {
        if (configured !== SOURCE_ADDRESS_AUTO) {
            this.logger.debug(`Using configured source address ${configured}`)
            return configured
        }

        try {
            const detected = await this.detect()
            this.logger.info(`Detected public IP ${detected}`)
            return detected
        } catch (error) {
            const detectionError = createError(ERROR_CODES.PUBLIC_IP_DETECTION_FAILED, {
                message: `Could not detect public IP using ${this.echoUrl}: ${ErrorUtils.extractErrorMessage(error)}`,
                context: { echoUrl: this.echoUrl },
                cause: error,
            })
            this.logger.warn(detectionError.message)
            return await this.promptAddress()
        }
    }

    /**
     * @throws Error when echo service is unreachable or answers something else than an address
     */
    async detect(): Promise<SourceAddress> {
        const body = (await this.fetcher(this.echoUrl)).trim()
        if (!CoreValidators.isValidSourceAddress(body)) {
            throw new Error(`Unexpected response from address echo service: '${body.slice(0, 64)}'`)
        }
        return CoreBrandedTypeCreators.createSourceAddress(body)
    }

    private async promptAddress(): Promise<SourceAddress> {
        while (true) {
            const answer = (await this.prompter.input({
                message: "Could not detect your public IP. Enter the address or CIDR block allowed to connect (eg. 203.0.113.7 or 203.0.113.0/24):",
                validate: (v) => CoreValidators.isValidSourceAddress(v.trim()) || "Expected an IPv4 address or CIDR block",
            })).trim()

            if (CoreValidators.isValidSourceAddress(answer)) {
                return CoreBrandedTypeCreators.createSourceAddress(answer)
            }
            this.logger.warn(`Invalid source address '${answer}', asking again`)
        }
    }
}
