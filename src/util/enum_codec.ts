/**
 * @file Type-safe enum codec for binary serialization
 *
 * Bidirectional mapping between string literal names and the numeric codes
 * written to disk. Duplicate codes are rejected at construction, unknown
 * codes at decode time.
 */

export type EnumCodec<K extends string> = {
  codes: Readonly<Record<K, number>>;
  encode: (k: K) => number;
  decode: (code: number) => K;
};

/**
 *
 */
export function createEnumCodec<K extends string>(codes: Record<K, number>): EnumCodec<K> {
  const rev = new Map<number, K>();
  const keys = Object.keys(codes).filter((k): k is K => k in codes);
  for (const k of keys) {
    const v = codes[k];
    const prev = rev.get(v);
    if (prev !== undefined) {
      throw new Error(`duplicate code ${v} for ${k} and ${prev}`);
    }
    rev.set(v, k);
  }
  return {
    codes,
    encode: (k: K) => codes[k],
    decode: (code: number) => {
      const k = rev.get(code);
      if (k === undefined) {
        throw new Error(`unsupported code ${code}`);
      }
      return k;
    },
  };
}
