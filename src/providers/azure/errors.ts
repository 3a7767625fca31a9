import { z } from "zod"
import { DeploymentErrorDetail } from "../../core/ports"
import { ErrorUtils } from "../../tools/error-utils"

/**
 * Azure Resource Manager error body, same shape at every nesting level
 */
export interface AzureErrorResponse {
    code?: string
    message?: string
    target?: string
    details?: AzureErrorResponse[]
}

const AzureErrorResponseSchema: z.ZodType<AzureErrorResponse> = z.lazy(() => z.object({
    code: z.string().optional(),
    message: z.string().optional(),
    target: z.string().optional(),
    details: z.array(AzureErrorResponseSchema).optional(),
}))

// RestError.details holds the parsed response body: { error: {...} }
const RestErrorDetailsSchema = z.object({ error: AzureErrorResponseSchema })

const RestErrorSchema = z.object({
    code: z.string().optional(),
    message: z.string(),
    details: z.unknown().optional(),
})

export function toDeploymentErrorDetail(response: AzureErrorResponse): DeploymentErrorDetail {
    return {
        code: response.code,
        message: response.message ?? response.code ?? "Unknown error",
        target: response.target,
        details: (response.details ?? []).map(toDeploymentErrorDetail),
    }
}

/**
 * Best effort conversion of anything thrown by the Azure SDK into an error tree
 */
export function errorDetailFromThrown(error: unknown): DeploymentErrorDetail {
    const restError = RestErrorSchema.safeParse(error)
    if (restError.success) {
        const body = RestErrorDetailsSchema.safeParse(restError.data.details)
        if (body.success) {
            return toDeploymentErrorDetail(body.data.error)
        }
        return { code: restError.data.code, message: restError.data.message, details: [] }
    }
    return { message: ErrorUtils.extractErrorMessage(error), details: [] }
}
