import { deriveRadialVelocity } from '../physics/derivations';
import { HabitableZone, habitableZone, isInHabitableZone } from '../physics/habitableZone';
import { RadialVelocityCurve } from '../physics/radialVelocity';
import { FilterCriteria, PlanetRecord, Range } from '../types/planet';

export interface HabitablePlanet {
  record: PlanetRecord;
  zone: HabitableZone;
}

export interface RadialVelocityEntry {
  record: PlanetRecord;
  curve: RadialVelocityCurve;
}

export interface CatalogStats {
  count: number;
  massRange: Range;
  periodRange: Range;
}

export function inRange(value: number, [min, max]: Range): boolean {
  return min <= value && value <= max;
}

/** Mass AND period closed-interval filter. Input order is kept. */
export function selectByCriteria(records: readonly PlanetRecord[], criteria: FilterCriteria): PlanetRecord[] {
  return records.filter(
    (record) =>
      inRange(record.planetMassEarth, criteria.massRange) && inRange(record.orbitalPeriodDays, criteria.periodRange)
  );
}

/**
 * Planets whose semi-major axis lies inside their star's habitable zone.
 * Independent of any mass/period criteria.
 */
export function selectHabitable(records: readonly PlanetRecord[]): HabitablePlanet[] {
  const selected: HabitablePlanet[] = [];
  for (const record of records) {
    const zone = habitableZone(record.starEffectiveTempK);
    if (isInHabitableZone(record.semiMajorAxisAU, zone)) {
      selected.push({ record, zone });
    }
  }
  return selected;
}

export function radialVelocityView(records: readonly PlanetRecord[], criteria: FilterCriteria): RadialVelocityEntry[] {
  return selectByCriteria(records, criteria).map((record) => ({
    record,
    curve: deriveRadialVelocity(record, criteria.eccentricity)
  }));
}

export function catalogStats(records: readonly PlanetRecord[]): CatalogStats | null {
  if (records.length === 0) {
    return null;
  }

  let minMass = Infinity;
  let maxMass = -Infinity;
  let minPeriod = Infinity;
  let maxPeriod = -Infinity;
  for (const { planetMassEarth, orbitalPeriodDays } of records) {
    minMass = Math.min(minMass, planetMassEarth);
    maxMass = Math.max(maxMass, planetMassEarth);
    minPeriod = Math.min(minPeriod, orbitalPeriodDays);
    maxPeriod = Math.max(maxPeriod, orbitalPeriodDays);
  }

  return {
    count: records.length,
    massRange: [minMass, maxMass],
    periodRange: [minPeriod, maxPeriod]
  };
}

/** Criteria covering the whole record set, as a dashboard's sliders start out. */
export function defaultCriteria(stats: CatalogStats | null, eccentricity = 0): FilterCriteria {
  return {
    massRange: stats ? stats.massRange : [0, Infinity],
    periodRange: stats ? stats.periodRange : [0, Infinity],
    eccentricity
  };
}
