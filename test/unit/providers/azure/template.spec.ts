import { describe, it } from 'mocha'
import { expect } from 'chai'
import {
    BOOTSTRAP_EXTENSION_NAME, buildDeploymentTemplate, TEMPLATE_PARAMETER_NAMES, toArmParameterValues,
} from '../../../../src/providers/azure/template'
import { buildTemplateParameters } from '../../../../src/core/parameters'
import { CoreBrandedTypeCreators } from '../../../../src/core/types/branded'
import { testConfig } from '../../../helpers/fakes'

const SCRIPT = '#!/bin/bash\necho ready\n'

describe('ARM deployment template', () => {

    const template = buildDeploymentTemplate({ bootstrapScript: SCRIPT, tags: { env: 'test' } })

    it('should declare exactly the twelve deployment parameters', () => {
        expect(Object.keys(template.parameters)).to.have.members([...TEMPLATE_PARAMETER_NAMES])
        expect(Object.keys(template.parameters)).to.have.length(12)
        expect(template.parameters.adminPassword).to.deep.include({ type: 'securestring', defaultValue: '' })
        expect(template.parameters.adminSshPublicKey).to.deep.include({ type: 'string', defaultValue: '' })
    })

    it('should declare resources in dependency order', () => {
        expect(template.resources.map(r => r.type)).to.deep.equal([
            'Microsoft.Network/networkSecurityGroups',
            'Microsoft.Network/publicIPAddresses',
            'Microsoft.Network/virtualNetworks',
            'Microsoft.Network/networkInterfaces',
            'Microsoft.Compute/virtualMachines',
            'Microsoft.Compute/virtualMachines/extensions',
        ])
    })

    it('should only depend on resources declared earlier', () => {
        const declared: string[] = []
        for (const resource of template.resources) {
            for (const dependency of resource.dependsOn ?? []) {
                expect(declared.some(type => dependency.startsWith(`[resourceId('${type}'`)), dependency).to.equal(true)
            }
            declared.push(resource.type)
        }
    })

    it('should make the NIC depend on public IP, virtual network and NSG', () => {
        expect(template.resources[3].dependsOn).to.deep.equal([
            "[resourceId('Microsoft.Network/publicIPAddresses', parameters('publicIpName'))]",
            "[resourceId('Microsoft.Network/virtualNetworks', parameters('vnetName'))]",
            "[resourceId('Microsoft.Network/networkSecurityGroups', parameters('nsgName'))]",
        ])
    })

    it('should allow SSH from the source address only', () => {
        expect(template.resources[0].properties.securityRules).to.deep.equal([{
            name: 'allow-ssh',
            properties: {
                priority: 1000,
                protocol: 'Tcp',
                access: 'Allow',
                direction: 'Inbound',
                sourceAddressPrefix: "[parameters('sourceMyIpAddress')]",
                sourcePortRange: '*',
                destinationAddressPrefix: '*',
                destinationPortRange: '22',
            },
        }])
    })

    it('should add one rule per extra port and skip SSH duplicates', () => {
        const withPorts = buildDeploymentTemplate({ bootstrapScript: SCRIPT, openPorts: [22, 80, 2376] })
        const rules = withPorts.resources[0].properties.securityRules

        expect(Array.isArray(rules) && rules.map(r => [r.name, r.properties.priority, r.properties.destinationPortRange]))
            .to.deep.equal([['allow-ssh', 1000, '22'], ['allow-tcp-80', 1010, '80'], ['allow-tcp-2376', 1020, '2376']])
    })

    it('should embed the bootstrap script base64 encoded in protected settings', () => {
        const extension = template.resources[5]

        expect(extension.name).to.equal(`[format('{0}/{1}', parameters('vmName'), '${BOOTSTRAP_EXTENSION_NAME}')]`)
        expect(extension.properties.protectedSettings).to.deep.equal({
            script: Buffer.from(SCRIPT, 'utf-8').toString('base64'),
        })
        expect(extension.properties).to.deep.include({ publisher: 'Microsoft.Azure.Extensions', type: 'CustomScript' })
    })

    it('should tag every resource', () => {
        expect(template.resources.map(r => r.tags)).to.deep.equal(Array(6).fill({ env: 'test' }))
    })

    it('should choose the login method from the public key parameter', () => {
        const osProfile = template.resources[4].properties.osProfile

        expect(osProfile).to.deep.include({
            adminPassword: "[if(empty(parameters('adminSshPublicKey')), parameters('adminPassword'), json('null'))]",
            linuxConfiguration: "[if(empty(parameters('adminSshPublicKey')), variables('passwordLinuxConfiguration'), variables('sshLinuxConfiguration'))]",
        })
    })

    it('should output connection details', () => {
        expect(Object.keys(template.outputs)).to.deep.equal(['vmName', 'adminUsername', 'publicIpAddress', 'fqdn', 'sshCommand'])
    })

    describe('toArmParameterValues', () => {

        it('should wrap each set parameter and leave out the unused credential', () => {
            const parameters = buildTemplateParameters(
                testConfig(),
                { type: 'password', password: 'test-secret-Pass1' },
                CoreBrandedTypeCreators.createSourceAddress('203.0.113.0/24')
            )

            const values = toArmParameterValues(parameters)

            expect(values.adminPassword).to.deep.equal({ value: 'test-secret-Pass1' })
            expect(values.sourceMyIpAddress).to.deep.equal({ value: '203.0.113.0/24' })
            expect(values.vnetName).to.deep.equal({ value: 'test-vm-vnet' })
            expect(values).to.not.have.property('adminSshPublicKey')
            expect(Object.keys(values)).to.have.length(11)
        })
    })
})
