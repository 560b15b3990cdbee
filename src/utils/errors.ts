/**
 * Error types
 *
 * ConfigurationError is thrown and aborts the run. ValidationError and
 * PatternError are row- and rule-scoped: they are carried in results or
 * logged, never allowed to stop a run.
 */

import type { ZodIssue } from "zod";

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: ZodIssue[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ValidationError extends Error {
  constructor(
    readonly field: string,
    readonly value: string,
    readonly pattern: string,
  ) {
    super(`Validation failed for ${field}: '${value}' does not match '${pattern}'`);
    this.name = "ValidationError";
  }
}

export class PatternError extends Error {
  constructor(
    readonly pattern: string,
    message: string,
  ) {
    super(message);
    this.name = "PatternError";
  }
}
