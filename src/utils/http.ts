import type { z } from 'zod';
import { VendorApiError } from '@/utils/errors.js';

export const REQUEST_TIMEOUT_MS = 30000;

/**
 * Read a vendor JSON response and validate its shape.
 *
 * @param action - What the call was doing, used in error messages ("create DV360 query")
 * @throws VendorApiError on a non-2xx status or an unexpected body
 */
export async function parseJsonResponse<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>, action: string): Promise<T> {
    if (!response.ok) {
        const errorText = await response.text();
        throw new VendorApiError(`Failed to ${action}: ${response.status} ${response.statusText}. ${errorText}`.trim(), {
            upstreamStatus: response.status,
        });
    }

    let body: unknown;
    try {
        body = await response.json();
    } catch (error) {
        throw new VendorApiError(`Failed to ${action}: response was not JSON`, { cause: error, upstreamStatus: response.status });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
        throw new VendorApiError(`Failed to ${action}: unexpected response (${issues})`, { cause: result.error, upstreamStatus: response.status });
    }
    return result.data;
}
