/**
 * TLS options: protocol versions, client key store and hostname verification
 */

import { pathToFileURL } from 'node:url';
import {
  defineFileOption,
  requireAbsolutePath,
  requireBoolean,
  requireEnumList,
  requirePathViaUri,
  requireString,
} from '@vfs-connect/core';
import { httpConfig } from '../config-builder.js';

/** Protocol versions the connector can negotiate, in declaration order */
export const TLS_VERSIONS = ['V_1_0', 'V_1_1', 'V_1_2', 'V_1_3'] as const;

export type TlsVersion = (typeof TLS_VERSIONS)[number];

const joinVersions = (values: readonly TlsVersion[]): string => values.join(',');

/**
 * `http:tlsVersions` - JSON array of version tokens in, comma-joined string out:
 * `["V_1_2","V_1_3"]` projects to `"V_1_2,V_1_3"`.
 */
export const TlsVersions = defineFileOption<readonly string[], readonly TlsVersion[]>({
  name: 'http:tlsVersions',
  parse: (json, name) => requireEnumList(json, name, TLS_VERSIONS),
  of: (input, name) => requireEnumList(input, name, TLS_VERSIONS),
  project: joinVersions,
  apply: (opts, value) => httpConfig.setTlsVersions(opts, joinVersions(value)),
});

/**
 * `http:keyStoreFileUri` - `file:` URI of the client key store. The payload is
 * the absolute local path; the projection is its `file:///` URI.
 */
export const KeyStoreFile = defineFileOption<string, string>({
  name: 'http:keyStoreFileUri',
  parse: requirePathViaUri,
  of: requireAbsolutePath,
  project: (path) => pathToFileURL(path).href,
  apply: (opts, path) => httpConfig.setKeyStoreFile(opts, path),
});

/**
 * `http:keyStoreType` - key store format, e.g. `"PKCS12"`
 */
export const KeyStoreType = defineFileOption<string, string>({
  name: 'http:keyStoreType',
  parse: (json, name) => requireString(json, name, { nonEmpty: true }),
  of: (input, name) => requireString(input, name, { nonEmpty: true }),
  project: (value) => value,
  apply: (opts, value) => httpConfig.setKeyStoreType(opts, value),
});

export const HostnameVerification = defineFileOption<boolean, boolean>({
  name: 'http:hostnameVerification',
  parse: requireBoolean,
  of: requireBoolean,
  project: (value) => value,
  apply: (opts, value) => httpConfig.setHostnameVerificationEnabled(opts, value),
});
