import Alea from 'alea';

/** Uniform draw in [0, 1) */
export type Rng = () => number;

export type WfcSeed = number | string;

export function createRng(seed: WfcSeed): Rng {
  return Alea(seed);
}
