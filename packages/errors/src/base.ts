import { ERROR_CATALOG, type ErrorCode, type ErrorDomain } from "./catalog.js";

/**
 * Serialized form of a PacksmithError, safe to write to logs.
 */
export interface ErrorJSON {
  readonly name: string;
  readonly code: ErrorCode;
  readonly domain: ErrorDomain;
  readonly message: string;
  readonly isExpected: boolean;
  readonly metadata?: Readonly<Record<string, string>>;
  readonly cause?: string;
}

/**
 * Root of the error hierarchy. Subclasses pin `code`; everything else
 * is looked up in the catalog.
 */
export abstract class PacksmithError extends Error {
  abstract readonly code: ErrorCode;
  readonly metadata: Readonly<Record<string, string>> | undefined;

  constructor(message: string, metadata?: Record<string, string>, options?: { cause?: Error }) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
  }

  get domain(): ErrorDomain {
    return ERROR_CATALOG[this.code].domain;
  }

  get isExpected(): boolean {
    return ERROR_CATALOG[this.code].isExpected;
  }

  toJSON(): ErrorJSON {
    return {
      name: this.name,
      code: this.code,
      domain: this.domain,
      message: this.message,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

export function isPacksmithError(value: unknown): value is PacksmithError {
  return value instanceof PacksmithError;
}
