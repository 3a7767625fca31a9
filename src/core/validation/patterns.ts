/**
 * Validation patterns for deployment inputs
 * Compiled once, linear complexity, input size guarded before execution
 */

const IPV4_OCTET = "(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)"

export const INPUT_SIZE_LIMITS = {
    MAX_ADDRESS: 18,            // 255.255.255.255/32
    MAX_ADMIN_USERNAME: 32,
    MAX_RESOURCE_GROUP_NAME: 90,
    MAX_VM_NAME: 64,
    MAX_RESOURCE_NAME: 80,
    MAX_LOCATION: 64,
} as const

export const CORE_VALIDATION_PATTERNS = {
    /** Dotted quad, decimal octets 0-255 without leading zeros */
    IP_V4: new RegExp(`^${IPV4_OCTET}(?:\\.${IPV4_OCTET}){3}$`),

    /** Dotted quad with prefix length 0-32 */
    IP_V4_CIDR: new RegExp(`^${IPV4_OCTET}(?:\\.${IPV4_OCTET}){3}\\/(?:3[0-2]|[12]?\\d)$`),

    /** Linux user name accepted by cloud-init and useradd */
    ADMIN_USERNAME: /^[a-z_][a-z0-9_-]*$/,

    /** Azure resource group: alphanumerics, underscores, parentheses, hyphens, periods; no trailing period */
    RESOURCE_GROUP_NAME: /^[-\w.()]*[-\w()]$/,

    /** Azure Linux VM name: alphanumerics and hyphens, cannot start or end with hyphen */
    VM_NAME: /^[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?$/,

    /** Network resource names (VNet, subnet, NIC, NSG, public IP) */
    RESOURCE_NAME: /^[a-zA-Z0-9](?:[a-zA-Z0-9_.-]*[a-zA-Z0-9_])?$/,

    /** Azure location short name, eg. westeurope */
    LOCATION: /^[a-z0-9]+$/,
} as const

/**
 * User names Azure refuses as VM administrator
 */
export const AZURE_RESERVED_ADMIN_USERNAMES: readonly string[] = [
    "administrator", "admin", "user", "user1", "test", "user2", "test1", "user3",
    "admin1", "1", "123", "a", "actuser", "adm", "admin2", "aspnet", "backup",
    "console", "david", "guest", "john", "owner", "root", "server", "sql",
    "support", "support_388945a0", "sys", "test2", "test3", "user4", "user5",
]

/**
 * Throws when input exceeds maximum size, before any regex runs on it
 */
export function guardInputSize(input: string, maxSize: number, field: string): string {
    if (input.length > maxSize) {
        throw new Error(`Input too large for ${field}: ${input.length} > ${maxSize} chars`)
    }
    return input
}

function safeRegexTest(pattern: RegExp, input: string, maxSize: number): boolean {
    return input.length <= maxSize && pattern.test(input)
}

export class CoreValidators {

    static isValidIPv4(value: string): boolean {
        return typeof value === 'string' &&
            safeRegexTest(CORE_VALIDATION_PATTERNS.IP_V4, value, INPUT_SIZE_LIMITS.MAX_ADDRESS)
    }

    static isValidIPv4Cidr(value: string): boolean {
        return typeof value === 'string' &&
            safeRegexTest(CORE_VALIDATION_PATTERNS.IP_V4_CIDR, value, INPUT_SIZE_LIMITS.MAX_ADDRESS)
    }

    /**
     * A firewall rule source: single IPv4 address or IPv4 CIDR block
     */
    static isValidSourceAddress(value: string): boolean {
        return CoreValidators.isValidIPv4(value) || CoreValidators.isValidIPv4Cidr(value)
    }

    static isValidAdminUsername(value: string): boolean {
        return typeof value === 'string' &&
            value.length > 0 &&
            safeRegexTest(CORE_VALIDATION_PATTERNS.ADMIN_USERNAME, value, INPUT_SIZE_LIMITS.MAX_ADMIN_USERNAME) &&
            !AZURE_RESERVED_ADMIN_USERNAMES.includes(value)
    }

    /**
     * Azure VM password rules: 12 to 123 chars with 3 of lowercase, uppercase, digit, special char
     */
    static isValidAdminPassword(value: string): boolean {
        if (typeof value !== 'string' || value.length < 12 || value.length > 123) {
            return false
        }
        const classes = [/[a-z]/, /[A-Z]/, /\d/, /[^a-zA-Z\d]/].filter(re => re.test(value)).length
        return classes >= 3
    }

    static isValidResourceGroupName(value: string): boolean {
        return typeof value === 'string' &&
            safeRegexTest(CORE_VALIDATION_PATTERNS.RESOURCE_GROUP_NAME, value, INPUT_SIZE_LIMITS.MAX_RESOURCE_GROUP_NAME)
    }

    static isValidVmName(value: string): boolean {
        return typeof value === 'string' &&
            safeRegexTest(CORE_VALIDATION_PATTERNS.VM_NAME, value, INPUT_SIZE_LIMITS.MAX_VM_NAME)
    }

    static isValidResourceName(value: string): boolean {
        return typeof value === 'string' &&
            safeRegexTest(CORE_VALIDATION_PATTERNS.RESOURCE_NAME, value, INPUT_SIZE_LIMITS.MAX_RESOURCE_NAME)
    }

    static isValidLocation(value: string): boolean {
        return typeof value === 'string' &&
            safeRegexTest(CORE_VALIDATION_PATTERNS.LOCATION, value, INPUT_SIZE_LIMITS.MAX_LOCATION)
    }
}
