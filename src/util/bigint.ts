export function jsonStringifySafeBigint(obj: unknown): string {
  return JSON.stringify(obj, (_, val) => (typeof val === 'bigint' ? val.toString() : val));
}

export function toBigInt(value: unknown): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) throw new RangeError(`Not a safe integer: ${value}`);
    return BigInt(value);
  }
  if (typeof value === 'string') {
    const s = value.trim();
    if (!/^-?\d+$/.test(s)) throw new TypeError(`Not an integer string: "${value}"`);
    return BigInt(s);
  }
  throw new TypeError(`Cannot convert type ${typeof value} to BigInt`);
}

// Money columns are TEXT so that amounts past 2^53 survive a round trip.
export function bigintToDb(v: bigint): string { return v.toString(); }

export function dbToBigint(v: unknown): bigint {
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'bigint') return toBigInt(v);
  throw new TypeError(`Unexpected DB bigint type: ${typeof v}`);
}
