/**
 * Custom Error Classes
 *
 * Every failure an Operation can surface maps onto one FailureKind so the
 * dispatcher can report it without knowing which component raised it.
 */

import type { DownloadState } from '../stateMachine.js';

export type FailureKind =
  | 'transient-network'
  | 'rate-limited'
  | 'authentication-lost'
  | 'authentication-failed'
  | 'retries-exhausted'
  | 'ambiguous-output'
  | 'download-incomplete'
  | 'metadata-incomplete'
  | 'cancelled'
  | 'fatal';

/**
 * Base error class for all tunegrab errors
 */
export class TuneGrabError extends Error {
  public readonly code: string;
  public readonly kind: FailureKind;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    kind: FailureKind = 'fatal',
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TuneGrabError';
    this.code = code;
    this.kind = kind;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends TuneGrabError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      'fatal',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Invalid environment or settings at startup
 */
export class ConfigError extends TuneGrabError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', 'fatal', details);
    this.name = 'ConfigError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends TuneGrabError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      'fatal',
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * A retryable call kept failing until its attempt budget ran out
 */
export class RetriesExhaustedError extends TuneGrabError {
  public readonly attempts: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    super(
      `${operation} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${describeError(cause)}`,
      'RETRIES_EXHAUSTED',
      'retries-exhausted',
      { operation, attempts },
      { cause }
    );
    this.name = 'RetriesExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * The metadata service rejected us again after one re-authentication
 */
export class AuthenticationFailedError extends TuneGrabError {
  constructor(operation: string, cause: unknown) {
    super(
      `${operation} was rejected after re-authentication: ${describeError(cause)}`,
      'AUTHENTICATION_FAILED',
      'authentication-failed',
      { operation },
      { cause }
    );
    this.name = 'AuthenticationFailedError';
  }
}

/**
 * More than one file on disk could be the download's output
 */
export class AmbiguousOutputError extends TuneGrabError {
  public readonly candidates: string[];

  constructor(sourceId: string, candidates: string[]) {
    super(
      `Found ${candidates.length} candidate files for ${sourceId}; refusing to guess`,
      'AMBIGUOUS_OUTPUT',
      'ambiguous-output',
      { sourceId, candidates }
    );
    this.name = 'AmbiguousOutputError';
    this.candidates = candidates;
  }
}

/**
 * The downloader finished but no usable audio file could be located
 */
export class DownloadIncompleteError extends TuneGrabError {
  constructor(sourceId: string, reason: string) {
    super(
      `Download of ${sourceId} did not produce an audio file: ${reason}`,
      'DOWNLOAD_INCOMPLETE',
      'download-incomplete',
      { sourceId, reason }
    );
    this.name = 'DownloadIncompleteError';
  }
}

/**
 * The external downloader exited with an error
 */
export class DownloaderError extends TuneGrabError {
  public readonly exitCode: number;
  public readonly partialFileWritten: boolean;

  constructor(url: string, exitCode: number, stderr: string, partialFileWritten: boolean) {
    super(
      `Downloader failed with exit code ${exitCode}${lastLine(stderr) ? `: ${lastLine(stderr)}` : ''}`,
      'DOWNLOADER_ERROR',
      'fatal',
      { url, exitCode, stderr: stderr.substring(0, 1000), partialFileWritten }
    );
    this.name = 'DownloaderError';
    this.exitCode = exitCode;
    this.partialFileWritten = partialFileWritten;
  }
}

/**
 * The Operation ran past its wall-clock budget
 */
export class OperationCancelledError extends TuneGrabError {
  constructor(operationId: string, reason: string) {
    super(
      `Operation cancelled: ${reason}`,
      'OPERATION_CANCELLED',
      'cancelled',
      { operationId, reason }
    );
    this.name = 'OperationCancelledError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends TuneGrabError {
  constructor(
    downloadId: string,
    fromState: DownloadState,
    toState: DownloadState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      'fatal',
      { downloadId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

export interface OperationFailure {
  kind: FailureKind;
  detail: string;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return (lines[lines.length - 1] ?? '').trim().substring(0, 300);
}

/**
 * Collapse anything thrown during an Operation into the structured failure
 * shown to the user.
 */
export function toOperationFailure(error: unknown): OperationFailure {
  if (error instanceof TuneGrabError) {
    return { kind: error.kind, detail: error.message };
  }
  return { kind: 'fatal', detail: describeError(error) };
}
