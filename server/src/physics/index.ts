export * from './constants';
export * from './radialVelocity';
export * from './habitableZone';
export * from './derivations';
