import { Duration, defineFileOption, requireDuration, requireNonNegativeDuration } from '@vfs-connect/core';
import { httpConfig } from '../config-builder.js';

/**
 * `http:connectionTimeout` - ISO-8601 duration, e.g. `"PT30S"`
 */
export const ConnectionTimeout = defineFileOption<Duration, Duration>({
  name: 'http:connectionTimeout',
  parse: requireDuration,
  of: requireNonNegativeDuration,
  project: (value) => value.toString(),
  apply: (opts, value) => httpConfig.setConnectionTimeout(opts, value),
});

/**
 * `http:socketTimeout` - ISO-8601 duration, e.g. `"PT1M"`
 */
export const SocketTimeout = defineFileOption<Duration, Duration>({
  name: 'http:socketTimeout',
  parse: requireDuration,
  of: requireNonNegativeDuration,
  project: (value) => value.toString(),
  apply: (opts, value) => httpConfig.setSocketTimeout(opts, value),
});
