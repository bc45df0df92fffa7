import { SUN_EFFECTIVE_TEMP_K } from './constants';

export interface FluxCoefficients {
  seffSun: number;
  a: number;
  b: number;
  c: number;
}

// Kopparapu et al. (2014), ApJL 787 L29.
export const RECENT_VENUS: FluxCoefficients = { seffSun: 1.776, a: 0.013, b: 2.04e-4, c: -2.89e-8 };
export const EARLY_MARS: FluxCoefficients = { seffSun: 0.32, a: 0.094, b: 1.73e-4, c: -5.44e-9 };

export interface HabitableZone {
  innerAU: number;
  outerAU: number;
}

export function effectiveFlux(coefficients: FluxCoefficients, starEffTempK: number): number {
  const dT = starEffTempK - SUN_EFFECTIVE_TEMP_K;
  const { seffSun, a, b, c } = coefficients;
  return seffSun + a * dT + b * dT ** 2 + c * dT ** 3;
}

/** Luminosity in solar units, from effective temperature alone. */
export function stellarLuminosity(starEffTempK: number): number {
  return (starEffTempK / SUN_EFFECTIVE_TEMP_K) ** 4;
}

/**
 * Inner (recent Venus) and outer (early Mars) habitable-zone edges in AU.
 * A non-positive effective flux yields NaN for that edge.
 */
export function habitableZone(starEffTempK: number): HabitableZone {
  const luminosity = stellarLuminosity(starEffTempK);
  return {
    innerAU: Math.sqrt(luminosity / effectiveFlux(RECENT_VENUS, starEffTempK)),
    outerAU: Math.sqrt(luminosity / effectiveFlux(EARLY_MARS, starEffTempK))
  };
}

export function isInHabitableZone(semiMajorAxisAU: number, zone: HabitableZone): boolean {
  return zone.innerAU <= semiMajorAxisAU && semiMajorAxisAU <= zone.outerAU;
}
