export interface PlanetRecord {
  name: string;
  hostName: string;
  planetMassEarth: number;
  orbitalPeriodDays: number;
  semiMajorAxisAU: number;
  eccentricity: number;
  starMassSolar: number;
  starEffectiveTempK: number;
  planetRadiusEarth?: number;
}

export type Range = readonly [min: number, max: number];

export interface FilterCriteria {
  massRange: Range;
  periodRange: Range;
  /** Applied to every amplitude computation, whatever the catalog value. */
  eccentricity: number;
}
