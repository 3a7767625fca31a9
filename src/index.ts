/**
 * Library entry point. The CLI lives in cli/main.ts.
 */

export * from './core/const';
export * from './core/ports';
export * from './core/config';
export { PublicIpResolver, fetchPublicIp } from './core/network/public-ip';
export { CredentialPreparer, generateRsaKeyPair, type LoginCredential } from './core/credentials';
export { ensureResourceGroup } from './core/resource-group';
export { buildTemplateParameters } from './core/parameters';
export { loadBootstrapTemplate, renderBootstrapScript, type BootstrapSlots } from './core/bootstrap/script';
export { Deployer, type DeployerArgs, type DeploymentOutcome } from './core/deployer';
export { DeploymentReporter, formatErrorDetail, type OutputWriter } from './core/reporter';
export { CoreValidators } from './core/validation/patterns';
export * from './errors';
export * from './providers/azure';
export { runCli } from './cli/program';
