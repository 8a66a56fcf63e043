/**
 * @fileoverview Shared utilities, configuration, and common functionality for mcpfleet
 */

// Configuration Management
export type {
  BaseConfigType,
  ControllerConfigType,
  GatewayConfigType,
  LoadOptions
} from './config';
export {
  BaseConfigSchema,
  ControllerConfigSchema,
  GatewayConfigSchema,
  ConfigManager,
  configManager,
  loadControllerConfig,
  loadGatewayConfig,
  Environment,
  ENV_PREFIX
} from './config';

// Structured Logging
export type {
  LogContext,
  LoggerConfig
} from './logger';
export {
  Logger,
  LoggerFactory,
  defaultLoggerConfig
} from './logger';

// Event Handling
export type {
  EventListener,
  EventContext,
  EventSubscriptionOptions,
  EventManagerOptions
} from './events';
export {
  EventSubscription,
  EventManager
} from './events';

// Health Checks
export type {
  HealthCheckResult,
  HealthCheckFunction,
  HealthCheckConfig,
  HealthReport
} from './health';
export {
  HealthMonitor,
  HealthStatus
} from './health';

// Common Utilities
export * from './utils';
