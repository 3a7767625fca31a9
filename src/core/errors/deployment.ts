import { DeploymentErrorDetail } from '../ports'
import { ERROR_CODES } from './codes'
import { DeploymentError, DockerVmErrorOptions } from './taxonomy'

/**
 * Deployment refused by the provider before any resource was created,
 * typically a template validation failure. Carries the provider error tree.
 */
export class DeploymentRejectedError extends DeploymentError {
  readonly detail: DeploymentErrorDetail;

  constructor(detail: DeploymentErrorDetail, options: Omit<DockerVmErrorOptions, 'message'> = {}) {
    super(ERROR_CODES.DEPLOYMENT_SUBMIT_FAILED, { ...options, message: detail.message });
    this.detail = detail;
  }
}
