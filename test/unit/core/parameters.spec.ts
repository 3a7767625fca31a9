import { describe, it } from 'mocha'
import { expect } from 'chai'
import { buildTemplateParameters } from '../../../src/core/parameters'
import { CoreBrandedTypeCreators } from '../../../src/core/types/branded'
import { testConfig } from '../../helpers/fakes'

const SOURCE = CoreBrandedTypeCreators.createSourceAddress('203.0.113.7')

describe('buildTemplateParameters', () => {

    it('should forward the SSH public key and leave out the password', () => {
        const config = testConfig()

        const parameters = buildTemplateParameters(config, {
            type: 'ssh',
            publicKey: 'ssh-rsa AAAAB3test test@host',
            privateKeyPath: '/tmp/id_test',
            generated: false,
        }, SOURCE)

        expect(parameters).to.deep.equal({
            location: 'westeurope',
            vmName: 'test-vm',
            vmSize: 'Standard_B2s',
            adminUsername: 'dockeradmin',
            adminSshPublicKey: 'ssh-rsa AAAAB3test test@host',
            sourceMyIpAddress: '203.0.113.7',
            vnetName: 'test-vm-vnet',
            subnetName: 'test-vm-subnet',
            publicIpName: 'test-vm-pip',
            nsgName: 'test-vm-nsg',
            nicName: 'test-vm-nic',
        })
        expect(parameters).to.not.have.property('adminPassword')
    })

    it('should never include a public key parameter for password auth', () => {
        const config = testConfig({ auth: { type: 'password', password: 'Test-Secret-42' } })

        const parameters = buildTemplateParameters(config, { type: 'password', password: 'Test-Secret-42' }, SOURCE)

        expect(parameters).to.not.have.property('adminSshPublicKey')
        expect(parameters.adminPassword).to.equal('Test-Secret-42')
        expect(Object.keys(parameters)).to.have.length(11)
    })
})
