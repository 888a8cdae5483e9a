/**
 * Connector-side types the HTTP options hand over on apply
 */

/**
 * Fixed credentials answered to every proxy authentication request.
 */
export class StaticUserAuthenticator {
  readonly domain?: string;
  readonly username?: string;
  readonly password?: string;

  constructor(domain?: string, username?: string, password?: string) {
    this.domain = domain;
    this.username = username;
    this.password = password;
    Object.freeze(this);
  }

  toJSON(): Record<string, string | undefined> {
    return { domain: this.domain, username: this.username, password: this.password === undefined ? undefined : '[REDACTED]' };
  }
}

export interface ClientCookieInit {
  name: string;
  value?: string;
  domain?: string;
  path?: string;
  httpOnly?: boolean;
  secure?: boolean;
  creationDate?: Date;
  expiryDate?: Date;
  /** Attribute name to value; a name may be present without a value */
  attributes?: Iterable<readonly [string, string | undefined]>;
}

/**
 * Cookie as the connector sends it. Timestamps are instants.
 */
export class ClientCookie {
  readonly name: string;
  readonly value?: string;
  readonly domain?: string;
  readonly path?: string;
  readonly httpOnly: boolean;
  readonly secure: boolean;
  readonly creationDate?: Date;
  readonly expiryDate?: Date;
  private readonly attributes: ReadonlyMap<string, string | undefined>;

  constructor(init: ClientCookieInit) {
    this.name = init.name;
    this.value = init.value;
    this.domain = init.domain;
    this.path = init.path;
    this.httpOnly = init.httpOnly ?? false;
    this.secure = init.secure ?? false;
    this.creationDate = init.creationDate;
    this.expiryDate = init.expiryDate;
    this.attributes = new Map(init.attributes ?? []);
  }

  getAttribute(name: string): string | undefined {
    return this.attributes.get(name);
  }

  containsAttribute(name: string): boolean {
    return this.attributes.has(name);
  }

  attributeNames(): string[] {
    return Array.from(this.attributes.keys());
  }

  isExpired(at: Date = new Date()): boolean {
    return this.expiryDate !== undefined && this.expiryDate.getTime() <= at.getTime();
  }
}
