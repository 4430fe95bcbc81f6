import { describe, it } from 'node:test';
import assert from 'node:assert';
import { novapayPlugin } from '../../libs/connectors/novapay/novapayConnector.js';
import { ConnectorRegistry } from '../../libs/connectors/registry.js';
import { settlelinePlugin } from '../../libs/connectors/settleline/settlelineConnector.js';
import { parseConnectorConfig } from '../../libs/config/connectorConfig.js';
import { ConfigurationError, NotSupportedError, ValidationError } from '../../libs/errors/connectorErrors.js';
import { REQUEST_FLOWS } from '../../libs/flows/flowKinds.js';

const PLUGINS = [novapayPlugin, settlelinePlugin];

const novapayConfig = {
    id: 'novapay',
    baseUrls: { production: 'https://api.novapay.example', sandbox: 'https://sandbox.novapay.example' },
    authScheme: { type: 'bearer' }
};

const settlelineConfig = {
    id: 'settleline',
    baseUrls: { production: 'https://api.settleline.example', sandbox: 'https://sandbox.settleline.example' },
    authScheme: { type: 'hmac' }
};

describe('ConnectorRegistry', () => {
    const registry = ConnectorRegistry.create(PLUGINS, [settlelineConfig, novapayConfig], { environment: 'sandbox' });

    it('should list configured connectors by id', () => {
        assert.deepStrictEqual(registry.list(), ['novapay', 'settleline']);
        assert.strictEqual(registry.has('novapay'), true);
        assert.strictEqual(registry.get('settleline').id, 'settleline');
    });

    it('should report the flows each connector implements', () => {
        assert.deepStrictEqual(registry.capabilities(), {
            novapay: REQUEST_FLOWS,
            settleline: ['Authorize', 'Capture', 'Void', 'Refund', 'PSync']
        });
    });

    it('should refuse a connector that is not configured', () => {
        assert.throws(
            () => registry.get('ghostpay'),
            (error: unknown) => error instanceof NotSupportedError
                && error.message === 'Connector ghostpay is not supported by this deployment'
        );
    });

    it('should reject the whole configuration and list every problem', () => {
        const configs = [
            { ...novapayConfig, id: 'ghostpay' },
            { ...novapayConfig, baseUrls: { ...novapayConfig.baseUrls, production: 'not-a-url' } },
            novapayConfig,
            novapayConfig
        ];

        assert.throws(
            () => ConnectorRegistry.create(PLUGINS, configs, { environment: 'sandbox' }),
            (error: unknown) => {
                assert.ok(error instanceof ConfigurationError);
                assert.deepStrictEqual(error.violations, [
                    'connectors[0]: no connector named ghostpay',
                    'connectors[1].baseUrls.production: Invalid url',
                    'connectors[3]: novapay configured twice'
                ]);
                return true;
            }
        );
    });

    it('should refuse a configuration given to the wrong connector', () => {
        assert.throws(
            () => novapayPlugin.create(parseConnectorConfig(settlelineConfig), { environment: 'sandbox' }),
            { message: 'Configuration for settleline given to the novapay connector' }
        );
    });
});

describe('parseConnectorConfig', () => {
    it('should fill defaults', () => {
        const config = parseConnectorConfig(settlelineConfig);

        assert.strictEqual(config.requiresEmptyObjectForFullCapture, false);
        assert.strictEqual(config.idempotencyHeader, undefined);
        assert.deepStrictEqual(config.authScheme, {
            type: 'hmac',
            algorithm: 'sha256',
            signatureHeader: 'X-Signature',
            keyIdHeader: 'X-Key-Id',
            timestampHeader: 'X-Timestamp'
        });
    });

    it('should reject an id that is not lower snake case', () => {
        assert.throws(
            () => parseConnectorConfig({ ...novapayConfig, id: 'Nova-Pay' }),
            (error: unknown) => error instanceof ValidationError
                && error.message === 'Validation failed in ConnectorConfig: id Connector id must be lower snake case'
        );
    });
});
