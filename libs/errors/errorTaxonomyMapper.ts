/**
 * Gateway error classification.
 *
 * Classification is deterministic and based on, in order:
 * 1. The connector's own error-code table
 * 2. Generic error-code patterns
 * 3. HTTP status code
 * 4. Error message patterns
 *
 * An application-level code that is recognised always wins over the HTTP
 * status. An absent, empty or unrecognised code falls back to the HTTP
 * status; the raw code is kept on the classification either way.
 */

import { logger } from '../logging/logger.js';
import type { ErrorKind } from './errorKinds.js';
import type { AttemptStatus, RefundStatus } from '../status/statuses.js';
import type { FlowKind } from '../flows/flowKinds.js';

/**
 * Error fields as extracted from a gateway body. Any of them may be absent.
 */
export interface RawError {
    readonly code?: string | number | null;
    readonly message?: string | null;
    readonly reason?: string | null;
    readonly connectorTransactionId?: string | null;
    readonly connectorRefundId?: string | null;
    readonly networkDeclineCode?: string | null;
    readonly networkAdviceCode?: string | null;
    readonly networkErrorMessage?: string | null;
}

/**
 * Table entry for a connector error code. A status attached to an
 * AlreadyProcessed entry names the terminal status the operation already
 * reached.
 */
export interface ErrorCodeRule {
    readonly kind: ErrorKind;
    readonly attemptStatus?: AttemptStatus;
    readonly refundStatus?: RefundStatus;
}

export type ErrorCodeTable = Readonly<Record<string, ErrorKind | ErrorCodeRule>>;

export type ClassificationSource = 'code' | 'pattern' | 'http' | 'message' | 'default';

export interface ErrorClassification {
    readonly kind: ErrorKind;
    readonly source: ClassificationSource;
    /** Raw code as received, preserved for diagnostics */
    readonly rawCode?: string;
    readonly attemptStatus?: AttemptStatus;
    readonly refundStatus?: RefundStatus;
}

interface ErrorPattern {
    readonly patterns: readonly (string | RegExp)[];
    readonly kind: ErrorKind;
}

/**
 * Generic patterns shared by all connectors.
 * Order matters: first match wins.
 */
export const GENERIC_ERROR_PATTERNS: readonly ErrorPattern[] = [
    {
        patterns: ['ALREADY_CAPTURED', 'ALREADY_REFUNDED', 'ALREADY_VOIDED', 'ALREADY_CANCELLED', 'DUPLICATE_TRANSACTION', /already/i],
        kind: 'AlreadyProcessed'
    },
    {
        patterns: ['RATE_LIMIT', 'TOO_MANY_REQUESTS', 'THROTTLED'],
        kind: 'RateLimited'
    },
    {
        patterns: ['INSUFFICIENT_FUNDS', 'NOT_SUFFICIENT_FUNDS', /insufficient/i],
        kind: 'InsufficientFunds'
    },
    {
        patterns: ['INVALID_API_KEY', 'UNAUTHENTICATED', 'AUTHENTICATION_FAILED', 'INVALID_CREDENTIALS'],
        kind: 'AuthenticationFailed'
    },
    {
        patterns: ['FORBIDDEN', 'PERMISSION_DENIED', 'NOT_PERMITTED'],
        kind: 'AuthorizationFailed'
    },
    {
        patterns: ['NOT_SUPPORTED', 'UNSUPPORTED'],
        kind: 'NotSupported'
    },
    {
        patterns: ['DECLINED', 'DO_NOT_HONOR', 'EXPIRED_CARD', 'STOLEN_CARD', 'LOST_CARD', 'REFUSED', 'PICKUP_CARD'],
        kind: 'CardDeclined'
    },
    {
        patterns: ['TIMEOUT', 'UNAVAILABLE', 'INTERNAL_ERROR', 'SERVICE_ERROR', 'TRY_AGAIN', /timed?\s*out/i],
        kind: 'Transient'
    },
    {
        patterns: ['INVALID', 'VALIDATION', 'MISSING', 'MALFORMED', /parameter/i],
        kind: 'Validation'
    }
];

/**
 * HTTP status classification, used when the application code is absent or
 * not recognised.
 */
export function classifyHttpStatus(httpStatus: number): ErrorKind | undefined {
    if (httpStatus === 401) return 'AuthenticationFailed';
    if (httpStatus === 403) return 'AuthorizationFailed';
    if (httpStatus === 429) return 'RateLimited';
    if (httpStatus === 402) return 'CardDeclined';
    if (httpStatus === 409) return 'AlreadyProcessed';
    if (httpStatus === 400 || httpStatus === 404 || httpStatus === 422) return 'Validation';
    if (httpStatus === 408) return 'Transient';
    if (httpStatus === 501) return 'NotSupported';
    if (httpStatus >= 500 && httpStatus < 600) return 'Transient';
    return undefined;
}

/**
 * Returns the trimmed code, or undefined when nothing usable was sent.
 */
export function normalizeErrorCode(code: RawError['code']): string | undefined {
    if (typeof code === 'number') {
        return Number.isFinite(code) ? String(code) : undefined;
    }
    if (typeof code !== 'string') return undefined;
    const trimmed = code.trim();
    if (trimmed === '' || trimmed.toLowerCase() === 'null' || trimmed.toLowerCase() === 'undefined') {
        return undefined;
    }
    return trimmed;
}

function matchPatterns(value: string): ErrorKind | undefined {
    const matched = GENERIC_ERROR_PATTERNS.find(pattern =>
        pattern.patterns.some(p =>
            typeof p === 'string'
                ? value.toUpperCase().includes(p)
                : p.test(value)
        )
    );
    return matched?.kind;
}

export class ErrorTaxonomyMapper {
    private readonly table: ReadonlyMap<string, ErrorCodeRule>;

    constructor(
        public readonly connector: string,
        table: ErrorCodeTable = {}
    ) {
        const entries = new Map<string, ErrorCodeRule>();
        for (const [code, rule] of Object.entries(table)) {
            entries.set(code.trim().toUpperCase(), typeof rule === 'string' ? { kind: rule } : rule);
        }
        this.table = entries;
    }

    /**
     * Classifies one gateway error. Never throws.
     */
    map(rawError: RawError, httpStatus: number): ErrorClassification {
        const rawCode = normalizeErrorCode(rawError.code);

        if (rawCode !== undefined) {
            const rule = this.table.get(rawCode.toUpperCase());
            if (rule) {
                return { ...rule, source: 'code', rawCode };
            }

            const patternKind = matchPatterns(rawCode);
            if (patternKind) {
                return { kind: patternKind, source: 'pattern', rawCode };
            }

            logger.debug({ connector: this.connector, rawCode, httpStatus }, 'Unrecognised gateway error code');
        }

        const httpKind = classifyHttpStatus(httpStatus);
        if (httpKind) {
            return { kind: httpKind, source: 'http', rawCode };
        }

        const message = rawError.message ?? rawError.reason;
        if (message) {
            const messageKind = matchPatterns(message);
            if (messageKind) {
                return { kind: messageKind, source: 'message', rawCode };
            }
        }

        return { kind: 'Unknown', source: 'default', rawCode };
    }
}

/**
 * Attempt status implied by an error when the connector did not state one.
 * Only definitive issuer or gateway refusals imply a status; an unknown or
 * transient outcome never does.
 */
export function defaultAttemptStatusHint(kind: ErrorKind, flow: FlowKind): AttemptStatus | undefined {
    switch (flow) {
        case 'Authorize':
        case 'SetupMandate':
            if (kind === 'CardDeclined' || kind === 'InsufficientFunds' || kind === 'AuthorizationFailed') {
                return 'AuthorizationFailed';
            }
            return undefined;
        case 'Void':
            if (kind === 'CardDeclined' || kind === 'AuthorizationFailed' || kind === 'Validation') {
                return 'VoidFailed';
            }
            return undefined;
        default:
            return undefined;
    }
}
