import type { ErrorKind, RunError } from '../types/index.js';
import { FlowError, describeCause } from './errors.js';

interface ClassifyContext {
  selector?: string;
  url?: string;
}

export function classifyError(error: unknown, context: ClassifyContext = {}): ErrorKind {
  if (error instanceof FlowError) return error.kind;

  const text = describeCause(error).toLowerCase();

  if (isNavigationFailure(text) || (context.url && text.includes('timeout'))) {
    return 'NavigationError';
  }

  if (isSelectorFailure(text, context.selector)) {
    return 'SelectorError';
  }

  if (isWriteFailure(error, text)) {
    return 'IOError';
  }

  return 'ExtractionError';
}

export function toRunError(error: unknown, context: ClassifyContext = {}): RunError {
  return { kind: classifyError(error, context), message: describeCause(error) };
}

export function formatRunError(error: RunError): string {
  return `[${error.kind}] ${error.message}`;
}

export function formatStepError(stepId: string, error: RunError): string {
  return `step "${stepId}" failed: ${formatRunError(error)}`;
}

function isNavigationFailure(text: string): boolean {
  const patterns = [
    'net::err_',
    'navigation',
    'page.goto',
    'ns_error_',
    'err_name_not_resolved',
    'err_connection',
  ];
  return patterns.some((p) => text.includes(p));
}

function isSelectorFailure(text: string, selector?: string): boolean {
  const patterns = [
    'waiting for selector',
    'waiting for locator',
    'no element',
    'element not found',
    'is not a valid selector',
    'unexpected token',
    'not actionable',
    'not visible',
    'strict mode violation',
  ];
  if (patterns.some((p) => text.includes(p))) return true;
  return selector !== undefined && text.includes('timeout');
}

function isWriteFailure(error: unknown, text: string): boolean {
  if (error instanceof Error && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string' && ['EACCES', 'ENOENT', 'ENOSPC', 'EROFS', 'EISDIR', 'EPERM'].includes(code)) {
      return true;
    }
  }
  return text.includes('permission denied');
}
