/**
 * Branded types for values that passed validation once and must not be re-checked downstream
 */

import { CoreValidators } from '../validation/patterns'

export type Brand<T, TBrand> = T & { readonly __brand: TBrand }

/** Single IPv4 address or IPv4 CIDR block usable as a firewall rule source */
export type SourceAddress = Brand<string, 'SourceAddress'>

/** Linux user name safe to embed in the bootstrap script */
export type AdminUsername = Brand<string, 'AdminUsername'>

function isSourceAddress(value: string): value is SourceAddress {
    return CoreValidators.isValidSourceAddress(value)
}

function isAdminUsername(value: string): value is AdminUsername {
    return CoreValidators.isValidAdminUsername(value)
}

export class CoreBrandedTypeCreators {

    /**
     * @throws Error if value is neither an IPv4 address nor an IPv4 CIDR block
     */
    static createSourceAddress(value: string): SourceAddress {
        if (!isSourceAddress(value)) {
            throw new Error(`Invalid source address, expected IPv4 address or CIDR block: ${value}`)
        }
        return value
    }

    /**
     * @throws Error if value is not a valid Linux user name or is reserved by Azure
     */
    static createAdminUsername(value: string): AdminUsername {
        if (!isAdminUsername(value)) {
            throw new Error(`Invalid admin username: '${value}'. Use lowercase letters, digits, '-' or '_' (max 32 chars), not a reserved name.`)
        }
        return value
    }
}
