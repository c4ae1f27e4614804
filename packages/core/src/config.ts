import { InvalidArgumentError } from './errors/observa-error.js';
import { ObservaLogger } from './observability/logger.js';

/** Default limit on nested notifications before a cycle is assumed */
export const DEFAULT_MAX_NOTIFICATION_DEPTH = 64;

/**
 * Configuration accepted by observable objects and collections.
 */
export interface ObservableConfig {
  /** Parent logger; each instance logs through `logger.child(<ClassName>)` */
  logger?: ObservaLogger;
  /**
   * How deep writes made from inside observers may nest on one instance
   * before a {@link NotificationDepthError} is thrown (default: 64)
   */
  maxNotificationDepth?: number;
}

/** Configuration with every default filled in */
export type ResolvedObservableConfig = Required<ObservableConfig>;

const rootLogger = new ObservaLogger();

/** Defaults used when an instance is created without configuration */
export function defaultObservableConfig(): ResolvedObservableConfig {
  return {
    logger: rootLogger,
    maxNotificationDepth: DEFAULT_MAX_NOTIFICATION_DEPTH,
  };
}

/**
 * Fill in defaults and validate.
 *
 * @param config - Caller supplied configuration
 * @param moduleName - Sub-module the instance logger is named after
 */
export function resolveObservableConfig(
  config: ObservableConfig = {},
  moduleName: string
): ResolvedObservableConfig {
  const defaults = defaultObservableConfig();
  const maxNotificationDepth = config.maxNotificationDepth ?? defaults.maxNotificationDepth;

  if (!Number.isInteger(maxNotificationDepth) || maxNotificationDepth < 1) {
    throw new InvalidArgumentError('maxNotificationDepth must be a positive integer', {
      maxNotificationDepth,
    });
  }

  return {
    logger: (config.logger ?? defaults.logger).child(moduleName),
    maxNotificationDepth,
  };
}
