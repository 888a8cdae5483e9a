import { defineFileOption, requireBoolean, requireCharset, requireString } from '@vfs-connect/core';
import { httpConfig } from '../config-builder.js';

export const FollowRedirect = defineFileOption<boolean, boolean>({
  name: 'http:followRedirect',
  parse: requireBoolean,
  of: requireBoolean,
  project: (value) => value,
  apply: (opts, value) => httpConfig.setFollowRedirect(opts, value),
});

/** Send credentials with the first request instead of waiting for a challenge */
export const PreemptiveAuthentication = defineFileOption<boolean, boolean>({
  name: 'http:preemptiveAuthentication',
  parse: requireBoolean,
  of: requireBoolean,
  project: (value) => value,
  apply: (opts, value) => httpConfig.setPreemptiveAuth(opts, value),
});

/**
 * `http:urlCharset` - charset used to encode request URLs, e.g. `"UTF-8"`
 */
export const UrlCharset = defineFileOption<string, string>({
  name: 'http:urlCharset',
  parse: requireCharset,
  of: requireCharset,
  project: (value) => value,
  apply: (opts, value) => httpConfig.setUrlCharset(opts, value),
});

export const UserAgent = defineFileOption<string, string>({
  name: 'http:userAgent',
  parse: (json, name) => requireString(json, name),
  of: (input, name) => requireString(input, name),
  project: (value) => value,
  apply: (opts, value) => httpConfig.setUserAgent(opts, value),
});
