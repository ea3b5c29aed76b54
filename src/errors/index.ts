/**
 * Error Module
 * Exports all domain error types and utilities.
 */

export {
  DomainError,
  ConfigurationError,
  ValidationError,
  ArbitrationError,
  isDomainError,
  wrapError,
} from './DomainError';

export type {
  DomainErrorContext,
  ErrorCode,
  ConfigurationIssue,
  ValidationIssue,
} from './DomainError';
