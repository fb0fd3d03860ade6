import postgres from 'postgres';

// Connection-level failures raised by the driver outside of a query.
const CONNECTION_CODES = new Set([
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
]);

export type DatabaseErrorKind = 'integrity' | 'database';

export function classifyDatabaseError(error: unknown): DatabaseErrorKind | null {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current instanceof postgres.PostgresError) {
      // SQLSTATE class 23: integrity constraint violation
      return current.code.startsWith('23') ? 'integrity' : 'database';
    }
    const code: unknown = Reflect.get(current, 'code');
    if (typeof code === 'string' && CONNECTION_CODES.has(code)) {
      return 'database';
    }
    current = current.cause;
  }
  return null;
}
