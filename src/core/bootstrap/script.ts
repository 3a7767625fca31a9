import * as fs from "node:fs"
import * as path from "node:path"
import { getLogger } from "../../log/utils"
import { ERROR_CODES } from "../errors/codes"
import { createError } from "../errors/taxonomy"
import { CoreValidators, guardInputSize, INPUT_SIZE_LIMITS } from "../validation/patterns"
import { ErrorUtils } from "../../tools/error-utils"

const logger = getLogger("BootstrapScript")

/**
 * Resolves to <repo>/templates both from src/core/bootstrap and dist/core/bootstrap
 */
export const DEFAULT_BOOTSTRAP_TEMPLATE_PATH = path.resolve(__dirname, "..", "..", "..", "templates", "bootstrap.sh.tpl")

const SLOT_PATTERN = /\{\{\s*([A-Za-z][A-Za-z0-9]*)\s*\}\}/g
const VERSION_PATTERN = /^# template-version: (\d+)$/m

export interface BootstrapSlots {
    adminUsername: string
    sshKeyConfigured: boolean
}

const KNOWN_SLOTS: ReadonlySet<string> = new Set<keyof BootstrapSlots>(["adminUsername", "sshKeyConfigured"])

export interface BootstrapTemplate {
    version: number
    content: string
}

export function parseBootstrapTemplate(content: string): BootstrapTemplate {
    const versionMatch = VERSION_PATTERN.exec(content)
    if (!versionMatch) {
        throw invalidTemplate("Bootstrap template has no '# template-version: <n>' header")
    }
    return { version: Number(versionMatch[1]), content }
}

export function loadBootstrapTemplate(templatePath: string = DEFAULT_BOOTSTRAP_TEMPLATE_PATH): BootstrapTemplate {
    let content: string
    try {
        content = fs.readFileSync(templatePath, "utf-8")
    } catch (error) {
        throw invalidTemplate(`Could not read bootstrap template ${templatePath}: ${ErrorUtils.extractErrorMessage(error)}`, error)
    }
    const template = parseBootstrapTemplate(content)
    logger.debug(`Loaded bootstrap template ${templatePath} version ${template.version}`)
    return template
}

/**
 * Validate slot values then substitute them. Values are embedded in shell
 * double quotes, so only pattern-checked values get through.
 */
export function renderBootstrapScript(template: BootstrapTemplate, slots: BootstrapSlots): string {
    const adminUsername = guardInputSize(slots.adminUsername, INPUT_SIZE_LIMITS.MAX_ADMIN_USERNAME, "adminUsername")
    if (!CoreValidators.isValidAdminUsername(adminUsername)) {
        throw invalidTemplate(`Refusing to render bootstrap script with admin username '${adminUsername}'`)
    }

    const values: Record<keyof BootstrapSlots, string> = {
        adminUsername: adminUsername,
        sshKeyConfigured: slots.sshKeyConfigured ? "true" : "false",
    }

    const used = new Set<string>()
    const rendered = template.content.replace(SLOT_PATTERN, (_match, slot: string) => {
        if (!isKnownSlot(slot)) {
            throw invalidTemplate(`Unknown bootstrap template slot '${slot}'`)
        }
        used.add(slot)
        return values[slot]
    })

    for (const slot of KNOWN_SLOTS) {
        if (!used.has(slot)) {
            throw invalidTemplate(`Bootstrap template never uses slot '${slot}'`)
        }
    }
    if (rendered.includes("{{")) {
        throw invalidTemplate("Bootstrap template has a malformed slot")
    }

    return rendered
}

function isKnownSlot(slot: string): slot is keyof BootstrapSlots {
    return KNOWN_SLOTS.has(slot)
}

function invalidTemplate(message: string, cause?: unknown) {
    return createError(ERROR_CODES.BOOTSTRAP_TEMPLATE_INVALID, { message, cause })
}
