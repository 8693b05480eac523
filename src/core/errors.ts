/**
 * Error taxonomy for the intake flow
 *
 * transient  - external call failed or timed out; retry on the next message
 * permanent  - repeated failure, escalate to the manual path
 * validation - extracted data needs the user to clarify
 */

export type FailureKind = 'transient' | 'permanent' | 'validation';

export class IntakeError extends Error {
  readonly kind: FailureKind;

  constructor(message: string, kind: FailureKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IntakeError';
    this.kind = kind;
  }
}

export class ClassifierError extends IntakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transient', options);
    this.name = 'ClassifierError';
  }
}

export class TimeoutError extends IntakeError {
  readonly label: string;

  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`, 'transient');
    this.name = 'TimeoutError';
    this.label = label;
  }
}

export class NotFoundError extends IntakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transient', options);
    this.name = 'NotFoundError';
  }
}

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof IntakeError) {
    return error.kind;
  }
  return 'transient';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
