import { isLogLevel, logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/connectorErrors.js';
import { CONNECTOR_ENVIRONMENTS, type ConnectorEnvironment } from '../config/connectorConfig.js';

export type Environment = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string }
    /** Checked only when the variable is set; pair with 'required' to demand it */
    | { type: 'oneOf'; name: string; values: readonly string[] }
    | { type: 'forbidIf'; name: string; when: (env: Environment) => boolean; message: string }
    | { type: 'assert'; check: (env: Environment) => boolean; message: string };

/**
 * Environment the connector runtime needs at startup.
 */
export const RUNTIME_CONFIG_REQUIREMENTS: GuardRule[] = [
    { type: 'required', name: 'CONNECTOR_ENV' },
    { type: 'oneOf', name: 'CONNECTOR_ENV', values: CONNECTOR_ENVIRONMENTS },
    { type: 'oneOf', name: 'LOG_LEVEL', values: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] },
    {
        type: 'forbidIf',
        name: 'PRODUCTION_DEBUG_LOGGING',
        when: env => env['CONNECTOR_ENV'] === 'production' && (env['LOG_LEVEL'] === 'debug' || env['LOG_LEVEL'] === 'trace'),
        message: 'Production cannot log at debug or trace level'
    }
];

/**
 * Fail-closed configuration guard. Every rule is evaluated and all
 * violations are reported together.
 */
export class ConfigGuard {
    static enforce(rules: readonly GuardRule[], env: Environment = process.env): void {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'oneOf': {
                        const value = env[rule.name];
                        if (value !== undefined && value !== '' && !rule.values.includes(value)) {
                            errors.push(`${rule.name} must be one of ${rule.values.join(', ')}`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(rule.message);
                        }
                        break;
                    }
                }
            } catch (error) {
                errors.push(`Check failed for rule: ${error instanceof Error ? error.message : String(error)}`);
            }
        }

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: 'Check environment variables. No defaults allowed.'
            }, 'Configuration Guard Violation');

            throw new ConfigurationError(`Configuration guard failed: ${errors.join('; ')}`, errors);
        }

        logger.info('Configuration guard passed.');
    }
}

export interface RuntimeConfig {
    readonly environment: ConnectorEnvironment;
    readonly logLevel: string;
}

export function loadRuntimeConfig(env: Environment = process.env): RuntimeConfig {
    ConfigGuard.enforce(RUNTIME_CONFIG_REQUIREMENTS, env);

    const environment = CONNECTOR_ENVIRONMENTS.find(candidate => candidate === env['CONNECTOR_ENV']);
    if (environment === undefined) {
        throw new ConfigurationError('CONNECTOR_ENV is not a connector environment', ['CONNECTOR_ENV']);
    }

    const level = env['LOG_LEVEL'];
    return {
        environment,
        logLevel: level !== undefined && isLogLevel(level) ? level : 'info'
    };
}
