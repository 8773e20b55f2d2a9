/**
 * Services module for dependency injection
 */

export {
  ServiceContainer,
  getContainer,
  createContainer,
  resetContainer,
  type Services,
  type ServiceFactories,
  type AnalyzerState,
} from './container.js';

export { loadServiceConfig, type ServiceConfig } from './config.js';
