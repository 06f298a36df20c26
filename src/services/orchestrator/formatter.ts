// Final response text
// Every recorded error is explained to the caller, whatever the pattern wrote

import type { ErrorInfo } from '../../utils/errors.js';

export const FALLBACK_TEXT = 'Your request could not be completed.';

export function describeError(error: ErrorInfo): string {
  const source = error.source ? `${error.source}: ` : '';
  return `  • [${error.code}] ${source}${error.message}`;
}

export function composeText(text: string, errors: readonly ErrorInfo[]): string {
  const body = text.trim();
  if (errors.length === 0) return body || 'Request processed.';

  const head = body || FALLBACK_TEXT;
  return `${head}\n\nSome steps could not be completed:\n${errors.map(describeError).join('\n')}`;
}
