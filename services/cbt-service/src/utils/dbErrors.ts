/**
 * Postgres SQLSTATE 23505: a UNIQUE constraint rejected the write.
 */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === '23505';
}
