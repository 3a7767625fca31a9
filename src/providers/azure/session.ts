import type { TokenCredential } from "@azure/identity"
import type { Subscription } from "@azure/arm-resources-subscriptions"
import { getLogger } from "../../log/utils"
import { ERROR_CODES } from "../../core/errors/codes"
import { createError } from "../../core/errors/taxonomy"
import { OperatorPrompter, ProviderSession } from "../../core/ports"
import { ErrorUtils } from "../../tools/error-utils"
import { SubscriptionsApiFactory } from "./api"
import { createAmbientCredential, createDeviceCodeCredential, createSubscriptionsApi } from "./sdk"

export const AZURE_MANAGEMENT_SCOPE = "https://management.azure.com/.default"

export interface AzureCredentialFactory {
    ambient(): TokenCredential
    /** Interactive login, used when ambient credential cannot get a token */
    interactive(notify: (message: string) => void): TokenCredential
}

export const DEFAULT_CREDENTIAL_FACTORY: AzureCredentialFactory = {
    ambient: createAmbientCredential,
    interactive: createDeviceCodeCredential,
}

export interface AzureSessionArgs {
    prompter: OperatorPrompter
    /** Select this subscription instead of resolving one */
    subscriptionId?: string
    credentialFactory?: AzureCredentialFactory
    subscriptionsApiFactory?: SubscriptionsApiFactory
    /** Where device code login instructions go */
    notify?: (message: string) => void
}

export interface AzureSessionContext {
    credential: TokenCredential
    session: ProviderSession
}

const ENABLED_SUBSCRIPTION_STATE = "Enabled"

/**
 * Authenticate against Azure and settle on one subscription
 */
export class AzureSession {

    private readonly logger = getLogger(AzureSession.name)
    private readonly args: AzureSessionArgs

    constructor(args: AzureSessionArgs) {
        this.args = args
    }

    async connect(): Promise<AzureSessionContext> {
        const credential = await this.authenticate()
        const session = await this.resolveSubscription(credential)
        this.logger.info(`Using subscription ${session.subscriptionName ?? ""} (${session.subscriptionId})`)
        return { credential, session }
    }

    async authenticate(): Promise<TokenCredential> {
        const factory = this.args.credentialFactory ?? DEFAULT_CREDENTIAL_FACTORY

        const ambient = factory.ambient()
        try {
            await ambient.getToken(AZURE_MANAGEMENT_SCOPE)
            this.logger.debug("Authenticated with ambient Azure credential")
            return ambient
        } catch (error) {
            this.logger.warn(`No usable Azure credential found (${ErrorUtils.extractErrorMessage(error)}), falling back to device code login`)
        }

        const interactive = factory.interactive(this.args.notify ?? ((message) => console.info(message)))
        try {
            await interactive.getToken(AZURE_MANAGEMENT_SCOPE)
            return interactive
        } catch (error) {
            throw createError(ERROR_CODES.AZURE_LOGIN_FAILED, {
                message: `Azure login failed: ${ErrorUtils.extractErrorMessage(error)}`,
                cause: error,
            })
        }
    }

    async resolveSubscription(credential: TokenCredential): Promise<ProviderSession> {
        const subscriptions = await this.listEnabledSubscriptions(credential)

        const configured = this.args.subscriptionId
        if (configured !== undefined) {
            const match = subscriptions.find(s => s.subscriptionId?.toLowerCase() === configured.toLowerCase())
            if (!match) {
                throw createError(ERROR_CODES.AZURE_NO_SUBSCRIPTION, {
                    message: `Subscription ${configured} is not enabled or not accessible with current credentials`,
                    context: { subscriptionId: configured },
                })
            }
            return toSession(match)
        }

        if (subscriptions.length === 0) {
            throw createError(ERROR_CODES.AZURE_NO_SUBSCRIPTION)
        }
        if (subscriptions.length === 1) {
            return toSession(subscriptions[0])
        }

        const chosenId = await this.args.prompter.select({
            message: "Azure subscription:",
            choices: subscriptions.map(s => ({
                name: `${s.displayName ?? "(unnamed)"} (${s.subscriptionId ?? ""})`,
                value: s.subscriptionId ?? "",
            })),
        })
        const chosen = subscriptions.find(s => s.subscriptionId === chosenId)
        if (!chosen) {
            throw createError(ERROR_CODES.AZURE_NO_SUBSCRIPTION, {
                message: `Unknown subscription ${chosenId}`,
            })
        }
        return toSession(chosen)
    }

    private async listEnabledSubscriptions(credential: TokenCredential): Promise<Subscription[]> {
        const api = (this.args.subscriptionsApiFactory ?? createSubscriptionsApi)(credential)
        const subscriptions: Subscription[] = []
        for await (const subscription of api.list()) {
            if (subscription.subscriptionId && subscription.state === ENABLED_SUBSCRIPTION_STATE) {
                subscriptions.push(subscription)
            }
        }
        this.logger.debug(`Found ${subscriptions.length} enabled subscription(s)`)
        return subscriptions
    }
}

function toSession(subscription: Subscription): ProviderSession {
    return {
        subscriptionId: subscription.subscriptionId ?? "",
        subscriptionName: subscription.displayName,
        tenantId: subscription.tenantId,
    }
}
