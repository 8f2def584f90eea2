export type ParsedUserAgent = {
  osName: string | null;
  osVersion: string | null;
  browserName: string | null;
  browserVersion: string | null;
};

/**
 * Turns a raw user agent string into the fields `ua_based` conditions
 * compare against.
 */
export interface IUserAgentParser {
  parse(userAgent: string): ParsedUserAgent;
}

/**
 * Resolves an IP address to an ISO 3166-1 alpha-2 country code.
 */
export interface ICountryLookup {
  initialize(): void;
  lookup(ip: string): string | null;
}
