import Alea from 'alea';
import { createNoise2D } from 'simplex-noise';

export interface NoiseConfig {
  octaves: number;
  frequency: number;
  amplitude: number;
  persistence: number;
  lacunarity: number;
}

// Sampled once per chunk, so frequencies are per chunk rather than per tile
export const defaultElevationConfig: NoiseConfig = {
  octaves: 4,
  frequency: 0.15,
  amplitude: 1.0,
  persistence: 0.5,
  lacunarity: 2.0,
};

export const defaultMoistureConfig: NoiseConfig = {
  octaves: 3,
  frequency: 0.2,
  amplitude: 1.0,
  persistence: 0.5,
  lacunarity: 2.0,
};

export type NoiseSampler = (x: number, y: number) => number;

/**
 * Fractal simplex noise seeded from `seed`. The sampler returns values in
 * [0, 1] and is defined for any coordinate, negative included.
 */
export function createFractalNoise(seed: string, config: NoiseConfig): NoiseSampler {
  const prng = Alea(seed);
  const noise2D = createNoise2D(prng);

  return (x, y) => {
    let value = 0;
    let freq = config.frequency;
    let amp = config.amplitude;
    let maxAmp = 0;

    for (let o = 0; o < config.octaves; o++) {
      value += noise2D(x * freq, y * freq) * amp;
      maxAmp += amp;
      freq *= config.lacunarity;
      amp *= config.persistence;
    }

    // Normalize to [-1, 1] then remap to [0, 1]
    value /= maxAmp;
    value = (value + 1) / 2;

    return Math.max(0, Math.min(1, value));
  };
}
