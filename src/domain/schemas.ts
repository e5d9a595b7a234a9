import { z } from 'zod';

const EXPIRES_IN_MESSAGE = 'expires_in must be a whole number of seconds';

// some providers send expires_in as a numeric string; nothing else is coerced
const expiresInSchema = z.union(
    [
        z.number().int(),
        z.string().regex(/^\s*-?\d+\s*$/).transform(val => parseInt(val.trim(), 10)),
    ],
    { errorMap: () => ({ message: EXPIRES_IN_MESSAGE }) },
);

export const tokenResponseSchema = z.object({
    access_token: z.string().min(1, 'access_token must be a non-empty string'),
    expires_in: expiresInSchema,
    token_type: z.string().optional(),
    scope: z.string().optional(),
});

const bindSchema = z.string()
    .regex(/^(\[[^\]]+\]|[^:\s]+):\d{1,5}$/, 'BIND must be host:port')
    .transform((val, ctx) => {
        const idx = val.lastIndexOf(':');
        const rawHost = val.slice(0, idx);
        const port = parseInt(val.slice(idx + 1), 10);
        if (port < 1 || port > 65535) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'BIND port must be between 1 and 65535' });
            return z.NEVER;
        }
        return {
            host: rawHost.startsWith('[') ? rawHost.slice(1, -1) : rawHost,
            port,
        };
    });

const httpUrl = (label: string) => z.string()
    .url(`${label} must be an absolute URL`)
    .refine(u => /^https?:\/\//i.test(u), { message: `${label} must use http or https` });

const nonNegativeInt = (label: string) => z.coerce.number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be an integer`)
    .nonnegative(`${label} must not be negative`);

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const envSchema = z.object({
    ESPLORA_UPSTREAM: httpUrl('ESPLORA_UPSTREAM'),
    OIDC_TOKEN_URL: httpUrl('OIDC_TOKEN_URL'),
    ESPLORA_CLIENT_ID: z.string({ required_error: 'ESPLORA_CLIENT_ID is required' }).min(1, 'ESPLORA_CLIENT_ID is required'),
    ESPLORA_CLIENT_SECRET: z.string({ required_error: 'ESPLORA_CLIENT_SECRET is required' }).min(1, 'ESPLORA_CLIENT_SECRET is required'),
    OIDC_SCOPE: z.string(),
    BIND: bindSchema,
    LOG_LEVEL: logLevelSchema,
    RESPONSE_DUMP_BYTES: nonNegativeInt('RESPONSE_DUMP_BYTES'),
    REQUEST_TIMEOUT_MS: nonNegativeInt('REQUEST_TIMEOUT_MS'),
    UPSTREAM_TIMEOUT_MS: nonNegativeInt('UPSTREAM_TIMEOUT_MS'),
    TOKEN_EXPIRY_MARGIN_SECONDS: nonNegativeInt('TOKEN_EXPIRY_MARGIN_SECONDS'),
    REFRESH_LEAD_SECONDS: nonNegativeInt('REFRESH_LEAD_SECONDS'),
    REFRESH_RETRY_SECONDS: nonNegativeInt('REFRESH_RETRY_SECONDS')
        .refine(v => v > 0, 'REFRESH_RETRY_SECONDS must be at least 1'),
    BODY_LIMIT_BYTES: nonNegativeInt('BODY_LIMIT_BYTES')
        .refine(v => v > 0, 'BODY_LIMIT_BYTES must be at least 1'),
});

export type ParsedEnv = z.infer<typeof envSchema>;
