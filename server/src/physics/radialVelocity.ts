import { EARTH_MASS_KG, G, SECONDS_PER_DAY, SOLAR_MASS_KG } from './constants';

export const CURVE_SAMPLES = 1000;

export interface VelocitySample {
  timeDays: number;
  velocityMps: number;
}

export interface RadialVelocityCurve {
  amplitudeMps: number;
  samples: VelocitySample[];
}

/**
 * Semi-amplitude K (m/s) of the host star's line-of-sight wobble.
 *
 * K = (2πG / P)^(1/3) · Mp / M*^(2/3) / √(1 − e²)
 *
 * Not validated: e ≥ 1 or non-positive masses and periods give NaN or Infinity.
 */
export function radialVelocityAmplitude(
  planetMassEarth: number,
  starMassSolar: number,
  orbitalPeriodDays: number,
  eccentricity = 0
): number {
  const periodSeconds = orbitalPeriodDays * SECONDS_PER_DAY;
  const planetMassKg = planetMassEarth * EARTH_MASS_KG;
  const starMassKg = starMassSolar * SOLAR_MASS_KG;

  return (
    Math.cbrt((2 * Math.PI * G) / periodSeconds) *
    planetMassKg /
    Math.pow(starMassKg, 2 / 3) /
    Math.sqrt(1 - eccentricity * eccentricity)
  );
}

/** `CURVE_SAMPLES` evenly spaced points of v(t) = K·sin(2πt/P) over [0, timeSpanDays]. */
export function radialVelocityCurve(amplitudeMps: number, periodDays: number, timeSpanDays: number): VelocitySample[] {
  const step = timeSpanDays / (CURVE_SAMPLES - 1);
  const samples: VelocitySample[] = new Array(CURVE_SAMPLES);

  for (let i = 0; i < CURVE_SAMPLES; i++) {
    // Le dernier point tombe exactement sur timeSpanDays.
    const timeDays = i === CURVE_SAMPLES - 1 ? timeSpanDays : i * step;
    samples[i] = {
      timeDays,
      velocityMps: amplitudeMps * Math.sin((2 * Math.PI * timeDays) / periodDays)
    };
  }

  return samples;
}
