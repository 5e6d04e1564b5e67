/** Upper bound of a postgres `integer` primary key. */
export const MAX_DB_ID = 2147483647;

/**
 * Whether the value can name a stored row. Anything else is simply not
 * found, instead of reaching the database as an out-of-range parameter.
 */
export function isDbId(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 1 && value <= MAX_DB_ID;
}
