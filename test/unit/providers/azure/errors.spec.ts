import { describe, it } from 'mocha'
import { expect } from 'chai'
import { errorDetailFromThrown, toDeploymentErrorDetail } from '../../../../src/providers/azure/errors'

/**
 * Shape of errors thrown by the Azure SDK pipeline
 */
class FakeRestError extends Error {
    constructor(message: string, readonly code?: string, readonly details?: unknown) {
        super(message)
    }
}

describe('Azure error mapping', () => {

    it('should keep the nested error tree', () => {
        const detail = toDeploymentErrorDetail({
            code: 'DeploymentFailed',
            message: 'At least one resource deployment operation failed.',
            details: [{ code: 'Conflict', message: 'Public IP quota reached', target: 'pip' }],
        })

        expect(detail.code).to.equal('DeploymentFailed')
        expect(detail.details).to.have.length(1)
        expect(detail.details[0]).to.deep.equal({ code: 'Conflict', message: 'Public IP quota reached', target: 'pip', details: [] })
    })

    it('should fall back to code then a placeholder when message is missing', () => {
        expect(toDeploymentErrorDetail({ code: 'BadRequest' }).message).to.equal('BadRequest')
        expect(toDeploymentErrorDetail({}).message).to.equal('Unknown error')
    })

    it('should read the response body carried by a REST error', () => {
        const thrown = new FakeRestError('The template deployment is not valid', 'InvalidTemplateDeployment', {
            error: {
                code: 'InvalidTemplateDeployment',
                message: "The template deployment 'test-vm-deployment' is not valid.",
                details: [{ code: 'SkuNotAvailable', message: 'Standard_B2s is not available' }],
            },
        })

        const detail = errorDetailFromThrown(thrown)

        expect(detail.message).to.equal("The template deployment 'test-vm-deployment' is not valid.")
        expect(detail.details.map(d => `${d.code}: ${d.message}`)).to.deep.equal(['SkuNotAvailable: Standard_B2s is not available'])
    })

    it('should use code and message of a REST error without body', () => {
        const detail = errorDetailFromThrown(new FakeRestError('Authorization failed', 'AuthorizationFailed'))

        expect(detail.code).to.equal('AuthorizationFailed')
        expect(detail.message).to.equal('Authorization failed')
        expect(detail.details).to.deep.equal([])
    })

    it('should describe anything else by its message', () => {
        const detail = errorDetailFromThrown('socket hang up')

        expect(detail.message).to.equal('socket hang up')
        expect(detail.details).to.deep.equal([])
    })
})
