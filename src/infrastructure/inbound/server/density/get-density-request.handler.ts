import { HTTPException } from 'hono/http-exception';
import { z } from 'zod/v4';

/**
 * Raw HTTP query parameters from the request
 */
export interface GetDensityHttpQuery {
    minCount?: string;
}

/**
 * Validates the minimum bucket size, 1 when absent
 */
const minCountParamSchema = z
    .string()
    .optional()
    .transform((val) => (val === undefined || val === '' ? 1 : Number(val)))
    .pipe(z.number().int().min(1));

const getDensityParamsSchema = z.object({
    minCount: minCountParamSchema,
});

export type GetDensityHttpParams = z.infer<typeof getDensityParamsSchema>;

/**
 * Handles HTTP request validation for GET /density
 */
export class GetDensityRequestHandler {
    /**
     * @throws HTTPException with 422 status for validation errors
     */
    handle(rawQuery: GetDensityHttpQuery): GetDensityHttpParams {
        const validatedParams = getDensityParamsSchema.safeParse(rawQuery);

        if (!validatedParams.success) {
            throw new HTTPException(422, {
                cause: { details: validatedParams.error.issues },
                message: 'Invalid request parameters',
            });
        }

        return validatedParams.data;
    }
}
