/**
 * Unit Tests: ErrorSanitizer
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { NotSupportedError } from '../../libs/errors/connectorErrors.js';
import { ErrorSanitizer, InternalConnectorError, sanitizeGatewayMessage } from '../../libs/errors/sanitizer.js';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe('ErrorSanitizer', () => {
    it('should wrap raw errors without exposing their message', () => {
        const rawError = new Error('Gateway client failed: password=secret123');
        const sanitized = ErrorSanitizer.sanitize(rawError, 'novapay:Authorize:build');

        assert.ok(sanitized instanceof InternalConnectorError);
        assert.strictEqual(sanitized.code, 'INTERNAL_ERROR');
        assert.strictEqual(sanitized.message, 'An internal connector error occurred (novapay:Authorize:build)');
        assert.strictEqual(sanitized.contextLabel, 'novapay:Authorize:build');
        assert.strictEqual(sanitized.cause, rawError);
        assert.match(sanitized.incidentId, UUID);
    });

    it('should wrap thrown values that are not errors', () => {
        const sanitized = ErrorSanitizer.sanitize('boom', 'settleline:Refund:build');

        assert.ok(sanitized instanceof InternalConnectorError);
        assert.strictEqual(sanitized.cause, 'boom');
    });

    it('should pass typed connector errors through unchanged', () => {
        const original = new NotSupportedError('Flow RSync', 'settleline');

        assert.strictEqual(ErrorSanitizer.sanitize(original, 'settleline:RSync:build'), original);
    });

    it('should give every wrapped error its own incident id', () => {
        const first = new InternalConnectorError('failed', 'test');
        const second = new InternalConnectorError('failed', 'test');

        assert.notStrictEqual(first.incidentId, second.incidentId);
    });
});

describe('sanitizeGatewayMessage', () => {
    it('should redact credentials and card numbers', () => {
        assert.strictEqual(
            sanitizeGatewayMessage('Invalid key: test-key-1 for card 4111111111111111'),
            'Invalid key=[REDACTED] for card [REDACTED_PAN]'
        );
        assert.strictEqual(sanitizeGatewayMessage('token=abc password:hunter2'), 'token=[REDACTED] password=[REDACTED]');
    });

    it('should leave ordinary messages alone', () => {
        assert.strictEqual(sanitizeGatewayMessage('Do not honour'), 'Do not honour');
        assert.strictEqual(sanitizeGatewayMessage(undefined), undefined);
    });

    it('should truncate long messages', () => {
        assert.strictEqual(sanitizeGatewayMessage('x'.repeat(600))?.length, 500);
    });
});
