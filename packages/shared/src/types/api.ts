import { type Result, err, ok } from 'neverthrow';
import { z } from 'zod';
import { type DecodeError, decodeError } from '../errors.js';
import { chatEventSchema } from './event.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(z.string(), jsonValueSchema),
    ]),
);

// Error bodies are only loosely specified; `code` and `msg` are read by name, everything else is kept as-is.
export const apiErrorPayloadSchema = z.record(z.string(), jsonValueSchema);

export type ApiErrorPayload = z.infer<typeof apiErrorPayloadSchema>;

export type ApiResult<T> = { result: 'success'; value: T } | { result: 'error'; payload: ApiErrorPayload };

// --- Response schemas ---

export const registerResponseSchema = z.object({
    queue_id: z.string().min(1),
    last_event_id: z.number().int(),
});

export const pollResponseSchema = z.object({
    events: z.array(chatEventSchema),
});

export type RegisterResponse = z.infer<typeof registerResponseSchema>;
export type PollResponse = z.output<typeof pollResponseSchema>;

const resultTagSchema = z.object({
    result: z.enum(['success', 'error']),
});

export function formatZodIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Splits a response body on its `result` tag and validates the success branch against `schema`.
 * A well-formed error body is a successful decode; only shape mismatches produce a DecodeError.
 */
export function decodeApiResult<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body: unknown,
    operation: string,
): Result<ApiResult<T>, DecodeError> {
    const tag = resultTagSchema.safeParse(body);
    if (!tag.success) {
        return err(decodeError(`${operation} response has no result tag: ${formatZodIssues(tag.error)}`, tag.error));
    }

    if (tag.data.result === 'error') {
        const payload = apiErrorPayloadSchema.safeParse(body);
        if (!payload.success) {
            return err(decodeError(`${operation} error body is not a JSON object: ${formatZodIssues(payload.error)}`));
        }
        return ok({ result: 'error', payload: payload.data });
    }

    const value = schema.safeParse(body);
    if (!value.success) {
        return err(decodeError(`${operation} response has an unexpected shape: ${formatZodIssues(value.error)}`, value.error));
    }
    return ok({ result: 'success', value: value.data });
}
