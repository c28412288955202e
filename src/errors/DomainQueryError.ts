/**
 * Base class for every failure raised by the domain query core.
 * Callers that only need to turn failures into a 4xx payload can catch this type.
 */
export class DomainQueryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DomainQueryError';
  }
}

/**
 * Suffix configuration is missing, malformed, or has nothing enabled
 */
export class ConfigError extends DomainQueryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * An operand was empty while building a candidate domain
 */
export class ValidationError extends DomainQueryError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * The upstream whois service could not produce a usable answer for a domain
 */
export class LookupError extends DomainQueryError {
  /** Domain that was being looked up */
  readonly domain: string;

  constructor(domain: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LookupError';
    this.domain = domain;
  }
}
