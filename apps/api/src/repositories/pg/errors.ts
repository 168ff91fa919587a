import postgres from 'postgres';
import { UniqueViolationError } from '../types.js';

const UNIQUE_VIOLATION = '23505';

/** Re-throws a unique-key collision as UniqueViolationError. */
export async function translateUnique<T>(query: PromiseLike<T>): Promise<T> {
  try {
    return await query;
  } catch (err) {
    if (err instanceof postgres.PostgresError && err.code === UNIQUE_VIOLATION) {
      throw new UniqueViolationError(err.constraint_name ?? 'unknown');
    }
    throw err;
  }
}
