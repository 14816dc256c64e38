import type { Logger } from '../types/logger.js';
import { createLogger } from './logger.js';
import { type MergedConfig, DEFAULT_CONFIG, loadConfig } from '../config/index.js';
import { FetchTransport, type Transport } from '../opensearch/transport.js';
import { SignatureImageCodec, type ImageCodec } from '../opensearch/image-codec.js';
import { createTemplateContext, type TemplateContext } from '../opensearch/template-context.js';
import { DescriptionReader } from '../opensearch/description-reader.js';
import { DescriptionWriter } from '../opensearch/description-writer.js';
import { SearchEngine, type SearchEngineOptions } from '../opensearch/search-engine.js';

/**
 * Overrides for collaborators, mainly for tests.
 */
export interface ContainerOverrides {
  logger?: Logger;
  transport?: Transport | null;
  imageCodec?: ImageCodec;
  templateContext?: TemplateContext;
}

/**
 * Container holding all application dependencies.
 */
export interface Container {
  /** Application logger */
  logger: Logger;
  /** Loaded configuration */
  config: MergedConfig;
  /** Network capability handed to every engine (null disables network use) */
  transport: Transport | null;
  /** Decoder for engine images */
  imageCodec: ImageCodec;
  /** Locale and application name for template expansion */
  templateContext: TemplateContext;
  /** Reader producing engines wired to the collaborators above */
  reader: DescriptionReader;
  /** Writer for description documents */
  writer: DescriptionWriter;
  /** Create an empty engine wired to the collaborators above */
  createEngine: () => SearchEngine;
}

/**
 * Create the application container from an already loaded config.
 */
export function createContainer(
  config: MergedConfig = DEFAULT_CONFIG,
  overrides: ContainerOverrides = {}
): Container {
  const logger: Logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      pretty: config.logging.pretty,
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
    });

  const transport =
    overrides.transport !== undefined
      ? overrides.transport
      : new FetchTransport({
          userAgent: config.http.userAgent,
          maxResponseBytes: config.http.maxResponseBytes,
        });

  const imageCodec = overrides.imageCodec ?? new SignatureImageCodec();
  const templateContext =
    overrides.templateContext ??
    createTemplateContext({ locale: config.locale, applicationName: config.applicationName });

  const engineOptions: SearchEngineOptions = { transport, imageCodec, templateContext, logger };

  logger.debug(
    { applicationName: config.applicationName, locale: templateContext.localeName() },
    'Container created'
  );

  return {
    logger,
    config,
    transport,
    imageCodec,
    templateContext,
    reader: new DescriptionReader({ engine: engineOptions, logger }),
    writer: new DescriptionWriter(),
    createEngine: () => new SearchEngine(engineOptions),
  };
}

/**
 * Load configuration from the default locations and create the container.
 */
export async function createContainerAsync(overrides: ContainerOverrides = {}): Promise<Container> {
  const config = await loadConfig();
  return createContainer(config, overrides);
}
