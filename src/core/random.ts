const MAX_UINT32 = 0xffffffff;

export const DEFAULT_RANDOM_SEED = 1;

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  readonly state: number;
}

export const isUint32Integer = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_UINT32;

export const createRandomSource = (seed: number = DEFAULT_RANDOM_SEED): RandomSource => {
  let state = isUint32Integer(seed) ? seed >>> 0 : DEFAULT_RANDOM_SEED;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let value = Math.imul(state ^ (state >>> 15), state | 1);
      value ^= value + Math.imul(value ^ (value >>> 7), value | 61);
      return ((value ^ (value >>> 14)) >>> 0) / (MAX_UINT32 + 1);
    },
    get state(): number {
      return state;
    },
  };
};
