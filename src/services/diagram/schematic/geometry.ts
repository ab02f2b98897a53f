/**
 * Drawing-space geometry. Units are abstract (one default element length
 * is 3 units); y grows upwards and is flipped only when writing SVG.
 */

export type Point = readonly [number, number];

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTION_ANGLES: Record<Direction, number> = {
  right: 0,
  up: 90,
  left: 180,
  down: 270,
};

export type Primitive =
  | { kind: 'polyline'; points: Point[]; closed: boolean; filled: boolean }
  | { kind: 'circle'; center: Point; radius: number; filled: boolean }
  | { kind: 'text'; at: Point; text: string; anchor: 'start' | 'middle' | 'end' };

export function add(a: Point, b: Point): Point {
  return [a[0] + b[0], a[1] + b[1]];
}

export function sub(a: Point, b: Point): Point {
  return [a[0] - b[0], a[1] - b[1]];
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(b[0] - a[0], b[1] - a[1]);
}

/** Angle of the vector a→b in degrees */
export function angleOf(a: Point, b: Point): number {
  return (Math.atan2(b[1] - a[1], b[0] - a[0]) * 180) / Math.PI;
}

export function polar(length: number, degrees: number): Point {
  const rad = (degrees * Math.PI) / 180;
  return [length * Math.cos(rad), length * Math.sin(rad)];
}

/**
 * Map a point from element-local space (x along the element, y to its left)
 * into drawing space.
 */
export function transform(local: Point, origin: Point, degrees: number): Point {
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return [origin[0] + local[0] * cos - local[1] * sin, origin[1] + local[0] * sin + local[1] * cos];
}

export function transformPrimitive(p: Primitive, origin: Point, degrees: number): Primitive {
  switch (p.kind) {
    case 'polyline':
      return { ...p, points: p.points.map((pt) => transform(pt, origin, degrees)) };
    case 'circle':
      return { ...p, center: transform(p.center, origin, degrees) };
    case 'text':
      return { ...p, at: transform(p.at, origin, degrees) };
  }
}

export function isPoint(value: unknown): value is Point {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number' &&
    Number.isFinite(value[0]) &&
    Number.isFinite(value[1])
  );
}
