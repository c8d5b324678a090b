/**
 * Uniform random value helpers for synthetic samples.
 *
 * A RandomSource returns a float in [0, 1), like Math.random. Injecting one
 * lets tests pin every generated value.
 */

export type RandomSource = () => number;

/**
 * Float in [min, max], formatted with a fixed number of decimals.
 */
export function uniform(random: RandomSource, min: number, max: number, decimals: number): string {
  return (min + random() * (max - min)).toFixed(decimals);
}

/**
 * Integer in [min, max], both ends inclusive.
 */
export function randomInt(random: RandomSource, min: number, max: number): string {
  return String(min + Math.floor(random() * (max - min + 1)));
}
