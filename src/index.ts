/**
 * opensearch-description
 *
 * OpenSearch 1.1 description documents: read them into search engines, build
 * search and suggestion requests, fetch suggestions and engine icons, and
 * write engines back out.
 */

export * from './opensearch/index.js';

export type { Logger } from './types/logger.js';
export { createLogger, createSilentLogger, type LoggerConfig } from './core/logger.js';
export { EventBus, createEventBus, type EventHandler } from './core/event-bus.js';
export {
  OpenSearchError,
  DescriptionError,
  TransportError,
  ConfigError,
  type OpenSearchErrorCode,
} from './core/errors.js';
export {
  createContainer,
  createContainerAsync,
  type Container,
  type ContainerOverrides,
} from './core/container.js';
export * from './config/index.js';
