import { PlanetRecord } from '../types/planet';
import { HabitableZone, habitableZone, isInHabitableZone } from './habitableZone';
import { RadialVelocityCurve, radialVelocityAmplitude, radialVelocityCurve } from './radialVelocity';

export function deriveRadialVelocity(record: PlanetRecord, eccentricity: number): RadialVelocityCurve {
  const amplitudeMps = radialVelocityAmplitude(
    record.planetMassEarth,
    record.starMassSolar,
    record.orbitalPeriodDays,
    eccentricity
  );
  return {
    amplitudeMps,
    samples: radialVelocityCurve(amplitudeMps, record.orbitalPeriodDays, 2 * record.orbitalPeriodDays)
  };
}

export interface Habitability {
  zone: HabitableZone;
  inZone: boolean;
}

export function describeHabitability(record: PlanetRecord): Habitability {
  const zone = habitableZone(record.starEffectiveTempK);
  return { zone, inZone: isInHabitableZone(record.semiMajorAxisAU, zone) };
}
