export { LatLon } from './LatLon';
export { Dms } from './Dms';
export type { Cardinal } from './Dms';
export { direct, inverse, normalizeBearing } from './geodesic';
export type { DirectResult, InverseResult } from './geodesic';
export { headingToPoint, rotatePoint } from './vector';
export type { Vec2 } from './vector';
