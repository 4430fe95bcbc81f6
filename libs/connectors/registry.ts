/**
 * Connector registry: validated configuration in, ready adapters out.
 *
 * Connectors are plugins; the registry only knows them by id. A config that
 * names an unknown connector, or two configs for the same connector, fail
 * the whole registry build.
 */

import { logger } from '../logging/logger.js';
import { ConfigurationError, NotSupportedError, ValidationError } from '../errors/connectorErrors.js';
import { parseConnectorConfig, type ConnectorConfig } from '../config/connectorConfig.js';
import type { AdapterOptions } from '../flows/connectorAdapter.js';
import type { FlowContract } from '../flows/flowContract.js';
import type { RequestFlow } from '../flows/flowKinds.js';

export interface ConnectorPlugin {
    readonly id: string;
    create(config: ConnectorConfig, options: AdapterOptions): FlowContract;
}

export class ConnectorRegistry {
    private constructor(private readonly adapters: ReadonlyMap<string, FlowContract>) {}

    static create(
        plugins: readonly ConnectorPlugin[],
        configs: readonly unknown[],
        options: AdapterOptions
    ): ConnectorRegistry {
        const pluginsById = new Map(plugins.map(plugin => [plugin.id, plugin]));
        const adapters = new Map<string, FlowContract>();
        const violations: string[] = [];

        configs.forEach((input, index) => {
            let config: ConnectorConfig;
            try {
                config = parseConnectorConfig(input);
            } catch (error) {
                if (!(error instanceof ValidationError)) throw error;
                violations.push(...error.issues.map(issue => `connectors[${index}].${issue.path}: ${issue.message}`));
                return;
            }

            const plugin = pluginsById.get(config.id);
            if (!plugin) {
                violations.push(`connectors[${index}]: no connector named ${config.id}`);
                return;
            }
            if (adapters.has(config.id)) {
                violations.push(`connectors[${index}]: ${config.id} configured twice`);
                return;
            }
            adapters.set(config.id, plugin.create(config, options));
        });

        if (violations.length > 0) {
            throw new ConfigurationError(`Connector configuration rejected: ${violations.join('; ')}`, violations);
        }

        logger.info({ connectors: [...adapters.keys()], environment: options.environment }, 'Connector registry ready');
        return new ConnectorRegistry(adapters);
    }

    has(id: string): boolean {
        return this.adapters.has(id);
    }

    get(id: string): FlowContract {
        const adapter = this.adapters.get(id);
        if (!adapter) {
            throw new NotSupportedError(`Connector ${id}`, 'this deployment');
        }
        return adapter;
    }

    list(): readonly string[] {
        return [...this.adapters.keys()].sort();
    }

    /**
     * Flows each configured connector implements, for capability listings.
     */
    capabilities(): Readonly<Record<string, readonly RequestFlow[]>> {
        const result: Record<string, readonly RequestFlow[]> = {};
        for (const id of this.list()) {
            result[id] = this.get(id).supportedFlows();
        }
        return result;
    }
}
