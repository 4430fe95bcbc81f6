export * from './amount/amountConverter.js';
export * from './amount/currency.js';
export * from './bootstrap/config-guard.js';
export * from './config/connectorConfig.js';
export * from './errors/connectorErrors.js';
export * from './errors/errorKinds.js';
export * from './errors/errorTaxonomyMapper.js';
export * from './errors/sanitizer.js';
export * from './flows/commonCapabilities.js';
export * from './flows/connectorAdapter.js';
export * from './flows/envelope.js';
export * from './flows/flowContract.js';
export * from './flows/flowData.js';
export * from './flows/flowDefinition.js';
export * from './flows/flowExecutor.js';
export * from './flows/flowKinds.js';
export * from './flows/http.js';
export * from './flows/responseMappers.js';
export * from './flows/result.js';
export * from './logging/logger.js';
export * from './paymentMethods/dispatcher.js';
export * from './paymentMethods/paymentMethodData.js';
export * from './status/statusReconciler.js';
export * from './status/statuses.js';
export * from './validation/zod-middleware.js';
export * from './webhooks/processWebhook.js';
export * from './webhooks/signature.js';
export * from './webhooks/webhookEventMapper.js';
export * from './connectors/registry.js';
export { novapayConnector, novapayPlugin } from './connectors/novapay/novapayConnector.js';
export { settlelineConnector, settlelinePlugin } from './connectors/settleline/settlelineConnector.js';
