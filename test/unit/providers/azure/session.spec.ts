import { describe, it } from 'mocha'
import { expect } from 'chai'
import { AZURE_MANAGEMENT_SCOPE, AzureSession } from '../../../../src/providers/azure/session'
import { isDockerVmError } from '../../../../src/core/errors/taxonomy'
import { StaticPrompter } from '../../../helpers/fakes'
import { catchErrorAsync } from '../../../helpers/generic'
import { credentialFactory, enabledSubscription, FakeCredential, subscriptionsApi } from '../../../helpers/azure'

const SUB_A = '00000000-0000-0000-0000-00000000000a'
const SUB_B = '00000000-0000-0000-0000-00000000000b'

describe('AzureSession', () => {

    describe('authenticate', () => {

        it('should use the ambient credential when it yields a token', async () => {
            const ambient = new FakeCredential()
            const { factory, notified } = credentialFactory(ambient)

            const credential = await new AzureSession({ prompter: new StaticPrompter(), credentialFactory: factory }).authenticate()

            expect(credential).to.equal(ambient)
            expect(ambient.scopes).to.deep.equal([AZURE_MANAGEMENT_SCOPE])
            expect(notified).to.deep.equal([])
        })

        it('should fall back to device code login', async () => {
            const interactive = new FakeCredential()
            const { factory, notified } = credentialFactory(new FakeCredential(new Error('no az login')), interactive)
            const notify = (_message: string) => undefined

            const credential = await new AzureSession({ prompter: new StaticPrompter(), credentialFactory: factory, notify }).authenticate()

            expect(credential).to.equal(interactive)
            expect(notified).to.deep.equal([notify])
        })

        it('should fail when both logins fail', async () => {
            const { factory } = credentialFactory(new FakeCredential(new Error('no az login')), new FakeCredential(new Error('code expired')))

            const error = await catchErrorAsync(() => new AzureSession({ prompter: new StaticPrompter(), credentialFactory: factory }).authenticate())

            expect(isDockerVmError(error) && error.code).to.equal('AZURE_LOGIN_FAILED')
            expect(error instanceof Error && error.message).to.equal('Azure login failed: code expired')
        })
    })

    describe('resolveSubscription', () => {

        function session(subscriptionIds: string[], prompter = new StaticPrompter(), subscriptionId?: string) {
            return new AzureSession({
                prompter,
                subscriptionId,
                subscriptionsApiFactory: subscriptionsApi([
                    ...subscriptionIds.map((id, i) => enabledSubscription(id, `sub-${i}`)),
                    { subscriptionId: '00000000-0000-0000-0000-0000000000ff', displayName: 'disabled', state: 'Disabled' },
                ]),
            })
        }

        it('should use the only enabled subscription without asking', async () => {
            const prompter = new StaticPrompter()

            const result = await session([SUB_A], prompter).resolveSubscription(new FakeCredential())

            expect(result).to.deep.equal({ subscriptionId: SUB_A, subscriptionName: 'sub-0', tenantId: 'test-tenant' })
            expect(prompter.selectCalls).to.deep.equal([])
        })

        it('should let the operator choose among several', async () => {
            const prompter = new StaticPrompter({ selections: [SUB_B] })

            const result = await session([SUB_A, SUB_B], prompter).resolveSubscription(new FakeCredential())

            expect(result.subscriptionId).to.equal(SUB_B)
            expect(prompter.selectCalls).to.deep.equal([{ message: 'Azure subscription:', values: [SUB_A, SUB_B] }])
        })

        it('should match a configured subscription ignoring case', async () => {
            const result = await session([SUB_A, SUB_B], new StaticPrompter(), SUB_B.toUpperCase()).resolveSubscription(new FakeCredential())

            expect(result.subscriptionId).to.equal(SUB_B)
        })

        it('should reject a configured subscription that is not enabled', async () => {
            const error = await catchErrorAsync(() =>
                session([SUB_A], new StaticPrompter(), '00000000-0000-0000-0000-0000000000ff').resolveSubscription(new FakeCredential()))

            expect(isDockerVmError(error) && error.code).to.equal('AZURE_NO_SUBSCRIPTION')
            expect(error instanceof Error && error.message)
                .to.equal('Subscription 00000000-0000-0000-0000-0000000000ff is not enabled or not accessible with current credentials')
        })

        it('should fail without any enabled subscription', async () => {
            const error = await catchErrorAsync(() => session([]).resolveSubscription(new FakeCredential()))

            expect(isDockerVmError(error) && error.code).to.equal('AZURE_NO_SUBSCRIPTION')
        })
    })
})
