import { inspect } from 'node:util';

function readCode(error: object): string | null {
  if (!('code' in error)) return null;
  return typeof error.code === 'string' ? error.code : null;
}

function describeError(error: Error): string {
  const parts = [error.message || error.name || 'Error'];
  const code = readCode(error);
  if (code) parts.push(`code ${code}`);
  return parts.join(' • ');
}

/** One line for the terminal, following `cause` links. */
export function formatUnknownError(error: unknown): string {
  if (!error) return 'Unknown error';
  if (typeof error === 'string') return error;
  if (error instanceof Error) {
    const chain = [describeError(error)];
    const seen = new Set<unknown>([error]);
    let cause: unknown = error.cause;
    while (cause !== undefined && cause !== null && !seen.has(cause)) {
      seen.add(cause);
      if (cause instanceof Error) {
        chain.push(describeError(cause));
        cause = cause.cause;
      } else {
        chain.push(typeof cause === 'string' ? cause : inspect(cause, { depth: 2 }));
        break;
      }
    }
    return chain.join(': ');
  }
  if (typeof error === 'object' && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string' && message.trim().length > 0) {
      const code = readCode(error);
      return code ? `${message} • code ${code}` : message;
    }
  }
  if (typeof error === 'object') {
    return inspect(error, { depth: 3, breakLength: 120, maxArrayLength: 20 });
  }
  return String(error);
}
