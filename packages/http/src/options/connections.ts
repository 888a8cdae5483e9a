import { MAX_INT32, defineFileOption, requireBoolean, requireInteger } from '@vfs-connect/core';
import { httpConfig } from '../config-builder.js';

const CONNECTION_LIMIT = { min: 1, max: MAX_INT32 };

export const KeepAlive = defineFileOption<boolean, boolean>({
  name: 'http:keepAlive',
  parse: requireBoolean,
  of: requireBoolean,
  project: (value) => value,
  apply: (opts, value) => httpConfig.setKeepAlive(opts, value),
});

export const MaxConnectionsPerHost = defineFileOption<number, number>({
  name: 'http:maxConnectionsPerHost',
  parse: (json, name) => requireInteger(json, name, CONNECTION_LIMIT),
  of: (input, name) => requireInteger(input, name, CONNECTION_LIMIT),
  project: (value) => value,
  apply: (opts, value) => httpConfig.setMaxConnectionsPerHost(opts, value),
});

export const MaxTotalConnections = defineFileOption<number, number>({
  name: 'http:maxTotalConnections',
  parse: (json, name) => requireInteger(json, name, CONNECTION_LIMIT),
  of: (input, name) => requireInteger(input, name, CONNECTION_LIMIT),
  project: (value) => value,
  apply: (opts, value) => httpConfig.setMaxTotalConnections(opts, value),
});
