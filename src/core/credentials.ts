import * as fs from "node:fs"
import * as path from "node:path"
import { utils as sshUtils } from "ssh2"
import { getLogger } from "../log/utils"
import { APP_NAME, AUTH_TYPE_PASSWORD, AUTH_TYPE_SSH } from "./const"
import { AuthConfig, SshAuthConfig } from "./config/interface"
import { ERROR_CODES } from "./errors/codes"
import { createError } from "./errors/taxonomy"
import { KeyPairGenerator, OperatorPrompter } from "./ports"
import { CoreValidators } from "./validation/patterns"
import { ErrorUtils } from "../tools/error-utils"

const PRIVATE_KEY_MODE = 0o600
const PUBLIC_KEY_MODE = 0o644
const RSA_KEY_BITS = 4096

export interface SshLoginCredential {
    type: typeof AUTH_TYPE_SSH
    /** OpenSSH public key line as read from disk */
    publicKey: string
    privateKeyPath: string
    /** True when the key pair was created during this run */
    generated: boolean
}

export interface PasswordLoginCredential {
    type: typeof AUTH_TYPE_PASSWORD
    password: string
}

export type LoginCredential = SshLoginCredential | PasswordLoginCredential

/**
 * RSA key pair without passphrase, both halves in OpenSSH format
 */
export const generateRsaKeyPair: KeyPairGenerator = (comment: string) => {
    const pair = sshUtils.generateKeyPairSync("rsa", { bits: RSA_KEY_BITS, comment: comment })
    return { privateKey: pair.private, publicKey: pair.public }
}

export function publicKeyPathFor(privateKeyPath: string): string {
    return `${privateKeyPath}.pub`
}

export interface CredentialPreparerArgs {
    prompter: OperatorPrompter
    keyGenerator?: KeyPairGenerator
}

export class CredentialPreparer {

    private readonly logger = getLogger(CredentialPreparer.name)
    private readonly prompter: OperatorPrompter
    private readonly keyGenerator: KeyPairGenerator

    constructor(args: CredentialPreparerArgs) {
        this.prompter = args.prompter
        this.keyGenerator = args.keyGenerator ?? generateRsaKeyPair
    }

    async prepare(auth: AuthConfig): Promise<LoginCredential> {
        if (auth.type === AUTH_TYPE_SSH) {
            return this.prepareSshKey(auth)
        }

        const password = auth.password ?? await this.promptPassword()
        return { type: AUTH_TYPE_PASSWORD, password: password }
    }

    /**
     * Reuse existing key pair when both files exist, otherwise generate one.
     * A lone private key without its .pub is overwritten.
     */
    prepareSshKey(auth: SshAuthConfig): SshLoginCredential {
        const privateKeyPath = auth.privateKeyPath
        const publicKeyPath = publicKeyPathFor(privateKeyPath)

        try {
            let generated = false
            if (fs.existsSync(privateKeyPath) && fs.existsSync(publicKeyPath)) {
                this.logger.debug(`Reusing SSH key pair ${privateKeyPath}`)
            } else {
                this.logger.info(`Generating SSH key pair ${privateKeyPath}`)
                const pair = this.keyGenerator(`${APP_NAME}@${path.basename(privateKeyPath)}`)
                fs.mkdirSync(path.dirname(privateKeyPath), { recursive: true })
                fs.writeFileSync(privateKeyPath, pair.privateKey, { mode: PRIVATE_KEY_MODE })
                fs.writeFileSync(publicKeyPath, ensureTrailingNewline(pair.publicKey), { mode: PUBLIC_KEY_MODE })
                generated = true
            }

            const publicKey = fs.readFileSync(publicKeyPath, "utf-8").trim()
            if (publicKey === "") {
                throw new Error(`Public key file ${publicKeyPath} is empty`)
            }

            return { type: AUTH_TYPE_SSH, publicKey, privateKeyPath, generated }
        } catch (error) {
            throw createError(ERROR_CODES.SSH_KEY_UNAVAILABLE, {
                message: `SSH key pair ${privateKeyPath} unavailable: ${ErrorUtils.extractErrorMessage(error)}`,
                context: { privateKeyPath },
                cause: error,
            })
        }
    }

    private async promptPassword(): Promise<string> {
        while (true) {
            const password = await this.prompter.password({
                message: "VM admin password:",
                validate: (v) => CoreValidators.isValidAdminPassword(v)
                    || "Use 12 to 123 characters with 3 of: lowercase, uppercase, digit, special character",
            })
            if (!CoreValidators.isValidAdminPassword(password)) {
                this.logger.warn("Password does not meet complexity requirements, asking again")
                continue
            }

            const confirmation = await this.prompter.password({ message: "Confirm password:" })
            if (confirmation === password) {
                return password
            }
            this.logger.warn("Passwords do not match, asking again")
        }
    }
}

function ensureTrailingNewline(content: string): string {
    return content.endsWith("\n") ? content : `${content}\n`
}
