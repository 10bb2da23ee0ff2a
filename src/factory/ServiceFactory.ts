/**
 * Service Factory - assembles the set service for a configuration
 *
 * Design Pattern: Factory
 *
 * Keeps the key type decision in one place so the HTTP layer and the
 * entry point only ever see ISetService.
 */

import { KeyType, ServiceConfig, resolveTreeConfig } from '../common/Config';
import { ISetService } from '../interfaces/OrderedSet';
import { SetService } from '../service/SetService';
import { HTTPServer } from '../server/HTTPServer';
import { INTEGER_KEYS, NUMBER_KEYS, STRING_KEYS } from './KeySchemas';

export function createSetService(config: ServiceConfig): ISetService {
  const options = {
    tree: resolveTreeConfig(config.tree),
    verbose: config.verbose,
  };

  switch (config.keyType) {
    case KeyType.INTEGER: return new SetService(INTEGER_KEYS, options);
    case KeyType.NUMBER: return new SetService(NUMBER_KEYS, options);
    case KeyType.STRING: return new SetService(STRING_KEYS, options);
  }
}

/**
 * Application Builder - wires service and HTTP server together
 */
export class ApplicationBuilder {
  private readonly config: ServiceConfig;
  private service: ISetService | null = null;

  constructor(config: ServiceConfig) {
    this.config = config;
  }

  withService(service: ISetService): ApplicationBuilder {
    this.service = service;
    return this;
  }

  buildService(): ISetService {
    return this.service ?? createSetService(this.config);
  }

  buildHTTPServer(service: ISetService): HTTPServer {
    return new HTTPServer(service, this.config.httpPort);
  }
}
