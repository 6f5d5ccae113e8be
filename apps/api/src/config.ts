import { z } from 'zod';

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8787),
    JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
    BILLING_WEBHOOK_SECRET: z.string().min(1).optional(),
    JOIN_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),
    REQUEST_LOGGING: z.enum(['true', 'false']).default('true'),
});

export interface ApiConfig {
    port: number;
    jwtSecret: string;
    /** The billing webhook is only mounted when set. */
    billingWebhookSecret?: string;
    transactionAttempts: number;
    requestLogging: boolean;
}

export function loadConfig(env: Record<string, string | undefined>): ApiConfig {
    const parsed = EnvSchema.parse(env);
    return {
        port: parsed.PORT,
        jwtSecret: parsed.JWT_SECRET,
        billingWebhookSecret: parsed.BILLING_WEBHOOK_SECRET,
        transactionAttempts: parsed.JOIN_RETRY_ATTEMPTS,
        requestLogging: parsed.REQUEST_LOGGING === 'true',
    };
}
