import { describe, it } from 'mocha'
import { expect } from 'chai'
import { loadBootstrapTemplate, parseBootstrapTemplate, renderBootstrapScript } from '../../../../src/core/bootstrap/script'
import { isDockerVmError } from '../../../../src/core/errors/taxonomy'
import { catchError } from '../../../helpers/generic'

function renderError(content: string, adminUsername = 'dockeradmin'): unknown {
    return catchError(() => renderBootstrapScript(parseBootstrapTemplate(content), { adminUsername, sshKeyConfigured: true }))
}

describe('bootstrap script', () => {

    describe('shipped template', () => {

        const template = loadBootstrapTemplate()

        it('should carry a version header', () => {
            expect(template.version).to.equal(1)
        })

        it('should fill both slots for key login', () => {
            const script = renderBootstrapScript(template, { adminUsername: 'dockeradmin', sshKeyConfigured: true })

            expect(script).to.include('ADMIN_USERNAME="dockeradmin"\n')
            expect(script).to.include('SSH_KEY_CONFIGURED="true"\n')
            expect(script).to.not.include('{{')
        })

        it('should mark password login when no key is configured', () => {
            const script = renderBootstrapScript(template, { adminUsername: 'dockeradmin', sshKeyConfigured: false })

            expect(script).to.include('SSH_KEY_CONFIGURED="false"\n')
        })

        it('should install Docker and grant the admin user access', () => {
            const script = renderBootstrapScript(template, { adminUsername: 'dockeradmin', sshKeyConfigured: true })

            expect(script.startsWith('#!/bin/bash\n')).to.equal(true)
            expect(script).to.include('apt-get update -y\n')
            expect(script).to.include('apt-get install -y docker-ce docker-ce-cli containerd.io docker-buildx-plugin docker-compose-plugin\n')
            expect(script).to.include('usermod -aG docker "$ADMIN_USERNAME"\n')
            expect(script).to.include('systemctl enable --now docker\n')
        })

        it('should disable password login only when a key was supplied', () => {
            const script = renderBootstrapScript(template, { adminUsername: 'dockeradmin', sshKeyConfigured: true })

            expect(script).to.include('if [ "$SSH_KEY_CONFIGURED" = "true" ]; then\n  PASSWORD_AUTH="no"\nelse\n  PASSWORD_AUTH="yes"\nfi\n')
        })
    })

    describe('slot validation', () => {

        it('should refuse admin usernames unsafe in shell', () => {
            const error = renderError('# template-version: 1\nU="{{adminUsername}}" K={{sshKeyConfigured}}', 'bob"; rm -rf /')

            expect(isDockerVmError(error) && error.code).to.equal('BOOTSTRAP_TEMPLATE_INVALID')
            expect(error instanceof Error && error.message).to.equal(`Refusing to render bootstrap script with admin username 'bob"; rm -rf /'`)
        })

        it('should refuse oversized admin usernames before matching', () => {
            const error = renderError('# template-version: 1\n{{adminUsername}} {{sshKeyConfigured}}', 'a'.repeat(40))

            expect(error instanceof Error && error.message).to.equal('Input too large for adminUsername: 40 > 32 chars')
        })

        it('should reject unknown slots', () => {
            const error = renderError('# template-version: 2\n{{adminUsername}} {{sshKeyConfigured}} {{hostname}}')

            expect(error instanceof Error && error.message).to.equal("Unknown bootstrap template slot 'hostname'")
        })

        it('should reject templates leaving a slot unused', () => {
            const error = renderError('# template-version: 1\n{{adminUsername}}')

            expect(error instanceof Error && error.message).to.equal("Bootstrap template never uses slot 'sshKeyConfigured'")
        })

        it('should reject malformed slots', () => {
            const error = renderError('# template-version: 1\n{{adminUsername}} {{sshKeyConfigured}} {{ bad-slot }}')

            expect(error instanceof Error && error.message).to.equal('Bootstrap template has a malformed slot')
        })

        it('should require a version header', () => {
            const error = catchError(() => parseBootstrapTemplate('{{adminUsername}} {{sshKeyConfigured}}'))

            expect(error instanceof Error && error.message).to.equal("Bootstrap template has no '# template-version: <n>' header")
        })

        it('should accept whitespace inside slot braces', () => {
            const script = renderBootstrapScript(
                parseBootstrapTemplate('# template-version: 1\n{{ adminUsername }}:{{sshKeyConfigured}}'),
                { adminUsername: 'dockeradmin', sshKeyConfigured: false }
            )

            expect(script).to.equal('# template-version: 1\ndockeradmin:false')
        })
    })
})
