/**
 * Test helpers with no knowledge of the domain
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'

/**
 * Run fn and return what it threw, failing when it did not throw
 */
export function catchError(fn: () => unknown): unknown {
    try {
        fn()
    } catch (error) {
        return error
    }
    throw new Error('Expected function to throw')
}

export async function catchErrorAsync(fn: () => Promise<unknown>): Promise<unknown> {
    try {
        await fn()
    } catch (error) {
        return error
    }
    throw new Error('Expected promise to reject')
}

/**
 * Fresh temporary directory, removed by the returned cleanup function
 */
export function createTempDir(prefix = 'azure-docker-vm-test-'): { dir: string, cleanup: () => void } {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix))
    return {
        dir,
        cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
    }
}
