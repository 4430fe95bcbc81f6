import { z } from 'zod';
import { validate } from '../validation/zod-middleware.js';

export const CONNECTOR_ENVIRONMENTS = ['sandbox', 'production'] as const;
export type ConnectorEnvironment = typeof CONNECTOR_ENVIRONMENTS[number];

/**
 * How a gateway authenticates requests. The scheme is configuration, so the
 * same connector code can talk to a gateway's key-header and signed-request
 * APIs.
 */
export const AuthSchemeSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('bearer') }),
    z.object({ type: z.literal('basic') }),
    z.object({ type: z.literal('header'), name: z.string().min(1) }),
    z.object({
        type: z.literal('hmac'),
        algorithm: z.enum(['sha256', 'sha512']).default('sha256'),
        signatureHeader: z.string().min(1).default('X-Signature'),
        keyIdHeader: z.string().min(1).default('X-Key-Id'),
        timestampHeader: z.string().min(1).default('X-Timestamp')
    }),
    z.object({
        type: z.literal('body'),
        keyField: z.string().min(1),
        secretField: z.string().min(1).optional()
    }),
    z.object({ type: z.literal('none') })
]);

export type AuthScheme = z.infer<typeof AuthSchemeSchema>;

export const ConnectorConfigSchema = z.object({
    id: z.string().regex(/^[a-z][a-z0-9_]*$/, 'Connector id must be lower snake case'),
    baseUrls: z.object({
        production: z.string().url(),
        sandbox: z.string().url()
    }),
    /** Second host some gateways use for a subset of flows (e.g. disputes) */
    secondaryBaseUrl: z.string().url().optional(),
    authScheme: AuthSchemeSchema,
    requiresEmptyObjectForFullCapture: z.boolean().default(false),
    /** Header carrying commonData.idempotencyKey, for gateways that accept one */
    idempotencyHeader: z.string().min(1).optional(),
    /** Overrides the header the connector reads its webhook signature from */
    webhookSignatureHeader: z.string().min(1).optional()
});

export type ConnectorConfig = z.infer<typeof ConnectorConfigSchema>;
export type ConnectorConfigInput = z.input<typeof ConnectorConfigSchema>;

export function parseConnectorConfig(input: unknown): ConnectorConfig {
    return validate(ConnectorConfigSchema, input, 'ConnectorConfig');
}

export function baseUrlFor(config: ConnectorConfig, environment: ConnectorEnvironment): string {
    return config.baseUrls[environment];
}
