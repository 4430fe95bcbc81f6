import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigGuard, RUNTIME_CONFIG_REQUIREMENTS, loadRuntimeConfig, type Environment } from '../../libs/bootstrap/config-guard.js';
import { ConfigurationError } from '../../libs/errors/connectorErrors.js';

function violationsOf(env: Environment): readonly string[] {
    try {
        ConfigGuard.enforce(RUNTIME_CONFIG_REQUIREMENTS, env);
    } catch (error) {
        assert.ok(error instanceof ConfigurationError);
        return error.violations;
    }
    return [];
}

describe('ConfigGuard', () => {
    it('should pass a complete environment', () => {
        assert.deepStrictEqual(violationsOf({ CONNECTOR_ENV: 'sandbox', LOG_LEVEL: 'debug' }), []);
    });

    it('should require the connector environment', () => {
        assert.throws(
            () => ConfigGuard.enforce(RUNTIME_CONFIG_REQUIREMENTS, {}),
            { message: 'Configuration guard failed: Required env var CONNECTOR_ENV is missing' }
        );
        assert.deepStrictEqual(violationsOf({ CONNECTOR_ENV: '  ' }), [
            'Required env var CONNECTOR_ENV is missing',
            'CONNECTOR_ENV must be one of sandbox, production'
        ]);
    });

    it('should report every violation together', () => {
        assert.deepStrictEqual(violationsOf({ CONNECTOR_ENV: 'staging', LOG_LEVEL: 'loud' }), [
            'CONNECTOR_ENV must be one of sandbox, production',
            'LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent'
        ]);
    });

    it('should forbid debug logging in production', () => {
        assert.deepStrictEqual(violationsOf({ CONNECTOR_ENV: 'production', LOG_LEVEL: 'trace' }), [
            'Production cannot log at debug or trace level (Rule: PRODUCTION_DEBUG_LOGGING)'
        ]);
        assert.deepStrictEqual(violationsOf({ CONNECTOR_ENV: 'production', LOG_LEVEL: 'info' }), []);
    });

    it('should record a failing or throwing assertion rule', () => {
        assert.throws(
            () => ConfigGuard.enforce([
                { type: 'assert', check: env => env['WEBHOOK_SECRET'] !== undefined, message: 'WEBHOOK_SECRET must be set' },
                {
                    type: 'assert',
                    check: () => {
                        throw new Error('secret store unreachable');
                    },
                    message: 'unused'
                }
            ], {}),
            (error: unknown) => error instanceof ConfigurationError && error.violations.join('|')
                === 'WEBHOOK_SECRET must be set|Check failed for rule: secret store unreachable'
        );
    });
});

describe('loadRuntimeConfig', () => {
    it('should default the log level', () => {
        assert.deepStrictEqual(loadRuntimeConfig({ CONNECTOR_ENV: 'sandbox' }), { environment: 'sandbox', logLevel: 'info' });
    });

    it('should keep a valid log level', () => {
        assert.deepStrictEqual(
            loadRuntimeConfig({ CONNECTOR_ENV: 'production', LOG_LEVEL: 'warn' }),
            { environment: 'production', logLevel: 'warn' }
        );
    });

    it('should refuse an invalid environment', () => {
        assert.throws(() => loadRuntimeConfig({ CONNECTOR_ENV: 'staging' }), ConfigurationError);
    });
});
