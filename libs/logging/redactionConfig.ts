/**
 * Centralized Redaction Configuration
 * Keys that must never reach a log line. Connector credentials travel in
 * every envelope, so both root and nested positions are covered.
 */
export const REDACT_KEYS = [
    // Connector credentials (Root and Nested)
    'authorization', '*.authorization',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',
    'apiSecret', '*.apiSecret',
    'api_secret', '*.api_secret',
    'key1', '*.key1',
    'key2', '*.key2',
    'secret', '*.secret',
    'webhookSecret', '*.webhookSecret',
    'password', '*.password',
    'token', '*.token',
    'access_token', '*.access_token',
    'connectorAuth', '*.connectorAuth',

    // Payment instrument data (Root and Nested)
    'cardNumber', '*.cardNumber',
    'card_number', '*.card_number',
    'cvc', '*.cvc',
    'cvv', '*.cvv',
    'accountNumber', '*.accountNumber',
    'account_number', '*.account_number',
    'iban', '*.iban',

    // Signatures
    'signature', '*.signature',
    'signatureHeader', '*.signatureHeader'
];

export const REDACT_CENSOR = '[REDACTED]';
