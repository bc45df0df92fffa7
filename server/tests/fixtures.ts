import { PlanetRecord } from '../src/types/planet';

export function makePlanet(overrides: Partial<PlanetRecord> = {}): PlanetRecord {
  return {
    name: 'Test-1 b',
    hostName: 'Test-1',
    planetMassEarth: 5,
    orbitalPeriodDays: 10,
    semiMajorAxisAU: 0.1,
    eccentricity: 0,
    starMassSolar: 1,
    starEffectiveTempK: 5778,
    ...overrides
  };
}

export const PLANETS: PlanetRecord[] = [
  makePlanet({ name: 'Alpha b', hostName: 'Alpha', planetMassEarth: 2, orbitalPeriodDays: 1.5, semiMajorAxisAU: 0.03 }),
  makePlanet({ name: 'Beta b', hostName: 'Beta', planetMassEarth: 1, orbitalPeriodDays: 365, semiMajorAxisAU: 1 }),
  makePlanet({ name: 'Gamma c', hostName: 'Gamma', planetMassEarth: 300, orbitalPeriodDays: 40, semiMajorAxisAU: 0.25 }),
  makePlanet({
    name: 'Delta d',
    hostName: 'Delta',
    planetMassEarth: 8,
    orbitalPeriodDays: 20,
    semiMajorAxisAU: 0.012,
    starEffectiveTempK: 3500
  }),
  makePlanet({ name: 'Epsilon b', hostName: 'Epsilon', planetMassEarth: 2, orbitalPeriodDays: 700, semiMajorAxisAU: 1.7 })
];

/** Archive-shaped row, as the TAP service returns it in JSON. */
export function archiveRow(record: PlanetRecord): Record<string, unknown> {
  return {
    pl_name: record.name,
    hostname: record.hostName,
    pl_bmasse: record.planetMassEarth,
    pl_orbper: record.orbitalPeriodDays,
    pl_orbsmax: record.semiMajorAxisAU,
    pl_orbeccen: record.eccentricity,
    st_mass: record.starMassSolar,
    st_teff: record.starEffectiveTempK,
    pl_rade: record.planetRadiusEarth ?? null
  };
}
