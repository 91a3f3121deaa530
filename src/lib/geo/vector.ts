export interface Vec2 {
  x: number;
  y: number;
}

const ORIGIN: Vec2 = { x: 0, y: 0 };
const NORTH: Vec2 = { x: 0, y: 1 };

/**
 * Rotate a point clockwise around an origin by an angle in radians
 */
export function rotatePoint(origin: Vec2, point: Vec2, angle: number): Vec2 {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  const dx = point.x - origin.x;
  const dy = point.y - origin.y;

  return {
    x: dx * cos + dy * sin + origin.x,
    y: dy * cos - dx * sin + origin.y,
  };
}

/**
 * Unit vector for a heading in degrees (0 = north, 90 = east)
 */
export function headingToPoint(heading: number): Vec2 {
  return rotatePoint(ORIGIN, NORTH, (heading * Math.PI) / 180);
}
