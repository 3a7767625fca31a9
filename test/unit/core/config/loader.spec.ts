import { describe, it, beforeEach, afterEach } from 'mocha'
import { expect } from 'chai'
import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { ConfigLoader } from '../../../../src/core/config/default'
import { ConfigurationError, isDockerVmError } from '../../../../src/core/errors/taxonomy'
import { catchError, createTempDir } from '../../../helpers/generic'

describe('ConfigLoader', () => {

    let tmp: { dir: string, cleanup: () => void }

    beforeEach(() => {
        tmp = createTempDir()
    })

    afterEach(() => {
        tmp.cleanup()
    })

    function writeJson(name: string, content: unknown): string {
        const filePath = path.join(tmp.dir, name)
        fs.writeFileSync(filePath, JSON.stringify(content))
        return filePath
    }

    it('should build a complete configuration from defaults alone', () => {
        const config = new ConfigLoader({ env: {} }).load()

        expect(config.resourceGroupName).to.equal('docker-vm-rg')
        expect(config.location).to.equal('westeurope')
        expect(config.vmName).to.equal('docker-vm')
        expect(config.vmSize).to.equal('Standard_B2s')
        expect(config.adminUsername).to.equal('azureuser')
        expect(config.deploymentName).to.equal('docker-vm-deployment')
        expect(config.sourceAddress).to.equal('auto')
        expect(config.auth).to.deep.equal({
            type: 'ssh',
            privateKeyPath: path.join(os.homedir(), '.ssh', 'azure_docker_vm_rsa'),
        })
        expect(config.network).to.deep.equal({
            vnetName: 'docker-vm-vnet',
            subnetName: 'docker-vm-subnet',
            publicIpName: 'docker-vm-pip',
            nsgName: 'docker-vm-nsg',
            nicName: 'docker-vm-nic',
        })
        expect(config.openPorts).to.deep.equal([])
        expect(config.tags).to.deep.equal({ managedBy: 'azure-docker-vm' })
        expect(config.deploymentTimeoutSeconds).to.equal(undefined)
    })

    it('should apply file, then environment, then overrides', () => {
        const configFile = writeJson('config.json', {
            location: 'northeurope',
            vmName: 'file-vm',
            vmSize: 'Standard_D2s_v5',
            openPorts: [80, 443],
        })
        const loader = new ConfigLoader({
            env: {
                AZURE_DOCKER_VM_LOCATION: 'eastus',
                AZURE_DOCKER_VM_VM_NAME: 'env-vm',
                AZURE_DOCKER_VM_DEPLOYMENT_TIMEOUT: '1800',
            },
        })

        const config = loader.load({ configFile, overrides: { vmName: 'flag-vm', openPorts: [8080] } })

        expect(config.vmSize).to.equal('Standard_D2s_v5')
        expect(config.location).to.equal('eastus')
        expect(config.vmName).to.equal('flag-vm')
        expect(config.deploymentName).to.equal('flag-vm-deployment')
        expect(config.openPorts).to.deep.equal([8080])
        expect(config.deploymentTimeoutSeconds).to.equal(1800)
    })

    it('should keep explicit network names and derive the missing ones', () => {
        const config = new ConfigLoader({ env: {} }).load({
            overrides: { vmName: 'box', network: { vnetName: 'shared-vnet' } },
        })

        expect(config.network.vnetName).to.equal('shared-vnet')
        expect(config.network.subnetName).to.equal('box-subnet')
    })

    it('should not add a key path to password auth', () => {
        const config = new ConfigLoader({ env: {} }).load({ overrides: { auth: { type: 'password' } } })

        expect(config.auth.type).to.equal('password')
        expect(config.auth).to.not.have.property('privateKeyPath')
    })

    it('should expand ~ in key path', () => {
        const config = new ConfigLoader({ env: {} }).load({ overrides: { auth: { privateKeyPath: '~/keys/vm' } } })

        expect(config.auth).to.deep.equal({ type: 'ssh', privateKeyPath: path.join(os.homedir(), 'keys', 'vm') })
    })

    it('should select password auth from a password set only in the environment', () => {
        const config = new ConfigLoader({ env: { AZURE_DOCKER_VM_ADMIN_PASSWORD: 'Test-Secret-42' } }).load({})

        expect(config.auth).to.deep.equal({ type: 'password', password: 'Test-Secret-42' })
    })

    it('should select password auth from a password set only in the config file', () => {
        const configFile = writeJson('config.json', { auth: { password: 'Test-Secret-42' } })

        const config = new ConfigLoader({ env: {} }).load({ configFile })

        expect(config.auth).to.deep.equal({ type: 'password', password: 'Test-Secret-42' })
    })

    it('should keep an explicitly chosen auth type over a password from another source', () => {
        const error = catchError(() => new ConfigLoader({ env: { AZURE_DOCKER_VM_ADMIN_PASSWORD: 'Test-Secret-42' } }).load({
            overrides: { auth: { type: 'ssh' } },
        }))

        expect(isDockerVmError(error) && error.message).to.include(
            '  - auth.password: A password cannot be combined with SSH key authentication'
        )
    })

    it('should reject a password combined with SSH key auth without the complexity hint', () => {
        const error = catchError(() => new ConfigLoader({ env: {} }).load({
            overrides: { auth: { type: 'ssh', password: 'Test-Secret-42' } },
        }))

        expect(error).to.be.instanceOf(ConfigurationError)
        expect(isDockerVmError(error) && error.code).to.equal('CONFIG_INVALID')
        expect(isDockerVmError(error) && error.message).to.equal([
            'Invalid configuration:',
            '  - auth.password: A password cannot be combined with SSH key authentication',
        ].join('\n'))
    })

    it('should reject a preset password failing complexity rules with the rules as hint', () => {
        const error = catchError(() => new ConfigLoader({ env: {} }).load({
            overrides: { auth: { type: 'password', password: 'short' } },
        }))

        expect(error).to.be.instanceOf(ConfigurationError)
        expect(error instanceof Error && error.message).to.equal([
            'Invalid configuration:',
            '  - auth.password: Password does not meet Azure complexity requirements',
            '    Use 12 to 123 chars with 3 of: lowercase, uppercase, digit, special char',
        ].join('\n'))
    })

    it('should reject a zero poll interval', () => {
        const error = catchError(() => new ConfigLoader({ env: {} }).load({ overrides: { pollIntervalSeconds: 0 } }))

        expect(error instanceof Error && error.message).to.include('  - pollIntervalSeconds: ')
    })

    it('should reject invalid source address with a suggestion', () => {
        const error = catchError(() => new ConfigLoader({ env: {} }).load({
            overrides: { sourceAddress: '300.1.1.1' },
        }))

        const message = error instanceof Error ? error.message : ''
        expect(message).to.include('  - sourceAddress: Invalid source address')
        expect(message).to.include('    Use "auto", an address like "203.0.113.7" or a block like "203.0.113.0/24"')
    })

    it('should reject reserved admin usernames', () => {
        const error = catchError(() => new ConfigLoader({ env: {} }).load({ overrides: { adminUsername: 'admin' } }))

        expect(error instanceof Error && error.message).to.include('  - adminUsername: Invalid or reserved admin username')
    })

    it('should reject unknown auth options from file', () => {
        const configFile = writeJson('config.json', { auth: { type: 'ssh', keyPath: '/tmp/key' } })

        const error = catchError(() => new ConfigLoader({ env: {} }).load({ configFile }))

        expect(error instanceof Error && error.message).to.include('  - auth: Unknown option(s): keyPath')
    })

    it('should report unreadable or non-object files', () => {
        const arrayFile = writeJson('array.json', [1, 2])

        const notObject = catchError(() => new ConfigLoader({ env: {} }).loadFile(arrayFile))
        const missing = catchError(() => new ConfigLoader({ env: {} }).loadFile(path.join(tmp.dir, 'missing.json')))

        expect(isDockerVmError(notObject) && notObject.code).to.equal('CONFIG_FILE_UNREADABLE')
        expect(isDockerVmError(notObject) && notObject.message).to.include('Top-level JSON value must be an object')
        expect(isDockerVmError(missing) && missing.code).to.equal('CONFIG_FILE_UNREADABLE')
    })

    it('should map environment variables to nested paths', () => {
        const loaded = new ConfigLoader({
            env: {
                AZURE_DOCKER_VM_AUTH_TYPE: 'password',
                AZURE_DOCKER_VM_ADMIN_PASSWORD: 'Test-Secret-42',
                AZURE_SUBSCRIPTION_ID: '',
            },
        }).loadEnv()

        expect(loaded).to.deep.equal({ auth: { type: 'password', password: 'Test-Secret-42' } })
    })
})
