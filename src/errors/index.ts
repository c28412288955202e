export { DomainQueryError, ConfigError, ValidationError, LookupError } from './DomainQueryError';
