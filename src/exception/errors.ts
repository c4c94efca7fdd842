import type { ErrorKind, RunError } from '../types/index.js';

export abstract class FlowError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toRunError(): RunError {
    return { kind: this.kind, message: this.message };
  }
}

export class ConfigError extends FlowError {
  readonly kind = 'ConfigError';

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class NavigationError extends FlowError {
  readonly kind = 'NavigationError';

  constructor(
    public readonly url: string,
    cause?: unknown,
  ) {
    super(`navigation to ${url} failed${cause ? `: ${describeCause(cause)}` : ''}`, { cause });
  }
}

export class SelectorError extends FlowError {
  readonly kind = 'SelectorError';

  constructor(
    public readonly selector: string,
    message = `no element matches selector "${selector}"`,
  ) {
    super(message);
  }
}

export class ExtractionError extends FlowError {
  readonly kind = 'ExtractionError';
}

export class IOError extends FlowError {
  readonly kind = 'IOError';

  constructor(
    public readonly path: string,
    cause?: unknown,
  ) {
    super(`failed to write ${path}${cause ? `: ${describeCause(cause)}` : ''}`, { cause });
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
