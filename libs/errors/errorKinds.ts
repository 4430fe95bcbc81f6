/**
 * Canonical error taxonomy.
 *
 * Every gateway error is classified into exactly one ErrorKind. The kind is
 * a classification hint for the caller: the core itself never retries.
 */

import type { AttemptStatus, RefundStatus } from '../status/statuses.js';

export type ErrorKind =
    | 'Validation'            // Request rejected as malformed → No retry
    | 'AuthenticationFailed'  // Credentials rejected → No retry
    | 'AuthorizationFailed'   // Credentials valid but not permitted → No retry
    | 'InsufficientFunds'     // Issuer decline, funds → No retry
    | 'CardDeclined'          // Issuer decline, other → No retry
    | 'AlreadyProcessed'      // Operation already applied → Resolve to existing status
    | 'RateLimited'           // Throttled → Retry after backoff
    | 'Transient'             // Network / 5xx → Retry under same idempotency key
    | 'NotSupported'          // Flow or method not offered → No retry
    | 'Unknown';              // Unclassified → Caller decides

export const ERROR_KINDS: readonly ErrorKind[] = [
    'Validation',
    'AuthenticationFailed',
    'AuthorizationFailed',
    'InsufficientFunds',
    'CardDeclined',
    'AlreadyProcessed',
    'RateLimited',
    'Transient',
    'NotSupported',
    'Unknown'
];

export type RetryHint = 'never' | 'after_backoff' | 'same_idempotency_key' | 'caller_decides';

export interface ErrorKindMetadata {
    readonly retryHint: RetryHint;
    /** Whether the issuer or gateway made a definitive negative decision */
    readonly definitive: boolean;
}

export const ERROR_KIND_METADATA: Record<ErrorKind, ErrorKindMetadata> = {
    Validation: { retryHint: 'never', definitive: true },
    AuthenticationFailed: { retryHint: 'never', definitive: true },
    AuthorizationFailed: { retryHint: 'never', definitive: true },
    InsufficientFunds: { retryHint: 'never', definitive: true },
    CardDeclined: { retryHint: 'never', definitive: true },
    AlreadyProcessed: { retryHint: 'never', definitive: true },
    RateLimited: { retryHint: 'after_backoff', definitive: false },
    Transient: { retryHint: 'same_idempotency_key', definitive: false },
    NotSupported: { retryHint: 'never', definitive: true },
    Unknown: { retryHint: 'caller_decides', definitive: false }
};

/**
 * Fully populated failure of one flow invocation.
 * Carries no timestamp, so two classifications of the same raw response
 * compare equal.
 */
export interface ErrorResponse {
    readonly statusCode: number;
    readonly code: string;
    readonly message: string;
    readonly reason?: string;
    readonly kind: ErrorKind;
    readonly attemptStatus?: AttemptStatus;
    readonly refundStatus?: RefundStatus;
    readonly connectorTransactionId?: string;
    readonly connectorRefundId?: string;
    readonly networkDeclineCode?: string;
    readonly networkAdviceCode?: string;
    readonly networkErrorMessage?: string;
}

export const NO_ERROR_CODE = 'No error code';
export const NO_ERROR_MESSAGE = 'No error message';

export function isRetryableKind(kind: ErrorKind): boolean {
    const { retryHint } = ERROR_KIND_METADATA[kind];
    return retryHint === 'after_backoff' || retryHint === 'same_idempotency_key';
}
