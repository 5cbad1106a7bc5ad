/**
 * Error taxonomy
 * Every failure sshm reports is one of these kinds.
 */

import type { OperationStep } from './types/index.js';

export type ErrorKind = 'parse' | 'not-found' | 'conflict' | 'external-tool' | 'io';

export class SshmError extends Error {
  readonly kind: ErrorKind;
  /** Tag, alias, path or URL the error is about */
  readonly subject: string;
  /** Set by the orchestrator once the error crosses a step boundary */
  step?: OperationStep;

  constructor(kind: ErrorKind, subject: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.subject = subject;
  }
}

export class ParseError extends SshmError {
  readonly line?: number;
  readonly fragment: string;

  constructor(subject: string, message: string, fragment: string, line?: number) {
    const where = line !== undefined ? ` (line ${line}: ${JSON.stringify(fragment)})` : ` (${JSON.stringify(fragment)})`;
    super('parse', subject, message + where);
    this.fragment = fragment;
    this.line = line;
  }
}

export class NotFoundError extends SshmError {
  constructor(subject: string, message: string) {
    super('not-found', subject, message);
  }
}

export class ConflictError extends SshmError {
  constructor(subject: string, message: string) {
    super('conflict', subject, message);
  }
}

export class ExternalToolError extends SshmError {
  readonly tool: string;
  readonly exitCode?: number;
  /** The tool's own stderr/stdout, verbatim */
  readonly diagnostic: string;

  constructor(tool: string, subject: string, message: string, diagnostic = '', exitCode?: number) {
    super('external-tool', subject, message);
    this.tool = tool;
    this.diagnostic = diagnostic;
    this.exitCode = exitCode;
  }
}

export class IOError extends SshmError {
  readonly code?: string;

  constructor(subject: string, message: string, code?: string) {
    super('io', subject, message);
    this.code = code;
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Convert anything thrown into an SshmError. Errors that already are one pass
 * through untouched; Node filesystem errors become IOError.
 */
export function toSshmError(err: unknown, subject: string): SshmError {
  if (err instanceof SshmError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new IOError(subject, message, errorCode(err));
}

export function isNodeError(err: unknown, code: string): boolean {
  return errorCode(err) === code;
}
