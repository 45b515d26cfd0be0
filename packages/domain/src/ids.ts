/** Largest value a Postgres BIGINT id column holds. */
const MAX_ID = 9223372036854775807n;

const ID_PATTERN = /^[1-9][0-9]{0,18}$/;

/** Numeric ordering of snowflake ids. Never compare ids as strings. */
export function compareIds(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  if (x === y) return 0;
  return x < y ? -1 : 1;
}

export function isValidId(value: string): boolean {
  return ID_PATTERN.test(value) && BigInt(value) <= MAX_ID;
}
