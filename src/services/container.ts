/**
 * Dependency injection container for reqclarity services.
 *
 * Provides:
 * - Centralized service configuration
 * - Lazy initialization (the analyzer trains on first use, once)
 * - Easy mocking for tests
 */

import type { Storage } from '../storage/index.js';
import type { AnalyzerHandle } from '../engines/analyzer.js';
import type { Logger } from '../utils/logger.js';
import type { ServiceConfig } from './config.js';

export type { ServiceConfig } from './config.js';

/**
 * Service container interface for dependency injection
 */
export interface Services {
  storage: Storage;
  analyzer: AnalyzerHandle;
  logger: Logger;
}

/**
 * Service factory functions for lazy initialization
 */
export interface ServiceFactories {
  createStorage: (config: ServiceConfig) => Storage;
  createAnalyzer: (config: ServiceConfig) => Promise<AnalyzerHandle>;
  getLogger: () => Logger;
}

export type AnalyzerState = 'idle' | 'initializing' | 'ready' | 'failed';

/**
 * Default service factories using real implementations
 */
let defaultFactories: ServiceFactories | null = null;

/**
 * Get default factories (lazy loaded to avoid circular imports)
 */
async function getDefaultFactories(): Promise<ServiceFactories> {
  if (!defaultFactories) {
    const [{ Storage }, { initialize }, { logger }] = await Promise.all([
      import('../storage/index.js'),
      import('../engines/analyzer.js'),
      import('../utils/logger.js'),
    ]);

    defaultFactories = {
      createStorage: (config) => new Storage(config.dbPath),
      createAnalyzer: (config) =>
        initialize({
          thresholds: config.thresholds,
          allowTokenizerFallback: config.allowTokenizerFallback,
        }),
      getLogger: () => logger,
    };
  }
  return defaultFactories;
}

/**
 * Service container that manages service lifecycles
 */
export class ServiceContainer {
  private storage: Storage | null = null;
  private logger: Logger | null = null;
  private analyzer: Promise<AnalyzerHandle> | null = null;
  private analyzerState: AnalyzerState = 'idle';
  private config: ServiceConfig;
  private factories: ServiceFactories | null = null;
  private customFactories: Partial<ServiceFactories> = {};

  constructor(config: ServiceConfig = {}) {
    this.config = config;
  }

  /**
   * Override a factory for testing
   */
  setFactory<K extends keyof ServiceFactories>(key: K, factory: ServiceFactories[K]): this {
    this.customFactories[key] = factory;
    this.factories = null;
    return this;
  }

  getConfig(): Readonly<ServiceConfig> {
    return this.config;
  }

  /**
   * Get or create the storage service
   */
  async getStorage(): Promise<Storage> {
    if (!this.storage) {
      const factories = await this.getFactories();
      this.storage = factories.createStorage(this.config);
    }
    return this.storage;
  }

  /**
   * Get the analyzer handle. Concurrent callers share one initialization;
   * a failed initialization stays failed until the container is reconfigured.
   */
  async getAnalyzer(): Promise<AnalyzerHandle> {
    if (!this.analyzer) {
      this.analyzerState = 'initializing';
      this.analyzer = this.getFactories()
        .then((factories) => factories.createAnalyzer(this.config))
        .then(
          (handle) => {
            this.analyzerState = 'ready';
            return handle;
          },
          (error: unknown) => {
            this.analyzerState = 'failed';
            throw error;
          }
        );
    }
    return this.analyzer;
  }

  getAnalyzerState(): AnalyzerState {
    return this.analyzerState;
  }

  /**
   * Get the logger
   */
  async getLogger(): Promise<Logger> {
    if (!this.logger) {
      const factories = await this.getFactories();
      this.logger = factories.getLogger();
    }
    return this.logger;
  }

  /**
   * Get all services (for tool handlers)
   */
  async getAll(): Promise<Services> {
    const [storage, analyzer, logger] = await Promise.all([
      this.getStorage(),
      this.getAnalyzer(),
      this.getLogger(),
    ]);
    return { storage, analyzer, logger };
  }

  /**
   * Clear all services (for cleanup/testing)
   */
  clear(): void {
    this.storage = null;
    this.logger = null;
    this.analyzer = null;
    this.analyzerState = 'idle';
  }

  /**
   * Close the database, if open, and clear all services
   */
  close(): void {
    this.storage?.close();
    this.clear();
  }

  /**
   * Update configuration
   */
  configure(config: Partial<ServiceConfig>): this {
    this.config = { ...this.config, ...config };
    // Services are recreated with the new config
    this.close();
    return this;
  }

  private async getFactories(): Promise<ServiceFactories> {
    if (!this.factories) {
      const defaults = await getDefaultFactories();
      this.factories = {
        ...defaults,
        ...this.customFactories,
      };
    }
    return this.factories;
  }
}

/**
 * Global container instance
 */
let globalContainer: ServiceContainer | null = null;

/**
 * Get the global service container
 */
export function getContainer(config?: ServiceConfig): ServiceContainer {
  if (!globalContainer) {
    globalContainer = new ServiceContainer(config);
  }
  return globalContainer;
}

/**
 * Create a new container (useful for testing)
 */
export function createContainer(config?: ServiceConfig): ServiceContainer {
  return new ServiceContainer(config);
}

/**
 * Reset the global container (for testing)
 */
export function resetContainer(): void {
  globalContainer?.close();
  globalContainer = null;
}
