import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

/** Operator-facing rendering of a startup or configuration failure. */
export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'StartupFailed': {
      const lines = [`Startup failed during ${error.phase}: ${error.message}`];
      if (error.missing && error.missing.length > 0) {
        lines.push(`Missing: ${error.missing.join(', ')}`);
      }
      if (error.cause !== undefined) {
        lines.push(`Cause: ${safeToString(error.cause)}`);
      }
      return lines.join('\n');
    }

    case 'Unexpected':
      return `${error.message}\nCause: ${safeToString(error.cause)}`;

    default:
      return assertNever(error);
  }
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
