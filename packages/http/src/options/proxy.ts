/**
 * Proxy options
 */

import {
  defineFileOption,
  optionalString,
  requireEnum,
  requireInteger,
  requireJsonObject,
  requireString,
  type JsonObject,
} from '@vfs-connect/core';
import { httpConfig } from '../config-builder.js';
import { StaticUserAuthenticator } from '../connector.js';

/**
 * Proxy credentials. Every field is optional and absent fields are left out
 * of the projection rather than written as empty strings.
 */
export interface ProxyCredentials {
  id?: string;
  password?: string;
  domain?: string;
}

const CREDENTIAL_KEYS = ['id', 'password', 'domain'] as const;

function parseCredentials(json: unknown, name: string): ProxyCredentials {
  const obj = requireJsonObject(json, name);
  const credentials: ProxyCredentials = {};
  for (const key of CREDENTIAL_KEYS) {
    const value = optionalString(obj, key, name, `member [${key}] must be string.`);
    if (value !== undefined) {
      credentials[key] = value;
    }
  }
  return credentials;
}

function projectCredentials(credentials: ProxyCredentials): JsonObject {
  const json: JsonObject = {};
  for (const key of CREDENTIAL_KEYS) {
    const value = credentials[key];
    if (value !== undefined) {
      json[key] = value;
    }
  }
  return json;
}

/**
 * `http:proxyAuthenticator` - `{"id": ..., "password": ..., "domain": ...}`
 */
export const ProxyAuthenticator = defineFileOption<ProxyCredentials, ProxyCredentials>({
  name: 'http:proxyAuthenticator',
  parse: parseCredentials,
  // native input goes through the same member checks as JSON
  of: (input, name) => parseCredentials(projectCredentials(input), name),
  project: projectCredentials,
  apply: (opts, { id, password, domain }) =>
    httpConfig.setProxyAuthenticator(opts, new StaticUserAuthenticator(domain, id, password)),
});

export const ProxyHost = defineFileOption<string, string>({
  name: 'http:proxyHost',
  parse: (json, name) => requireString(json, name, { nonEmpty: true }),
  of: (input, name) => requireString(input, name, { nonEmpty: true }),
  project: (value) => value,
  apply: (opts, value) => httpConfig.setProxyHost(opts, value),
});

const PORT_RANGE = { min: 1, max: 65_535 };

export const ProxyPort = defineFileOption<number, number>({
  name: 'http:proxyPort',
  parse: (json, name) => requireInteger(json, name, PORT_RANGE),
  of: (input, name) => requireInteger(input, name, PORT_RANGE),
  project: (value) => value,
  apply: (opts, value) => httpConfig.setProxyPort(opts, value),
});

export const PROXY_SCHEMES = ['http', 'https'] as const;

export type ProxySchemeName = (typeof PROXY_SCHEMES)[number];

export const ProxyScheme = defineFileOption<ProxySchemeName, ProxySchemeName>({
  name: 'http:proxyScheme',
  parse: (json, name) => requireEnum(json, name, PROXY_SCHEMES),
  of: (input, name) => requireEnum(input, name, PROXY_SCHEMES),
  project: (value) => value,
  apply: (opts, value) => httpConfig.setProxyScheme(opts, value),
});
