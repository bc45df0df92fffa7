/** Newtonian constant of gravitation, m³·kg⁻¹·s⁻² (CODATA 2018). */
export const G = 6.6743e-11;

/** Nominal Earth mass, kg (IAU 2015). */
export const EARTH_MASS_KG = 5.972167867791379e24;

/** Nominal solar mass, kg (IAU 2015). */
export const SOLAR_MASS_KG = 1.988409870698051e30;

export const SECONDS_PER_DAY = 86_400;

export const SUN_EFFECTIVE_TEMP_K = 5778;
