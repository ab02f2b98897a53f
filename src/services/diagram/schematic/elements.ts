/**
 * Circuit elements for the schematic drawing library.
 *
 * Two-terminal elements run from `start` to `end`; their symbol is drawn
 * centred with straight leads filling the rest. One-terminal elements
 * (Ground, Dot) sit at a single point and do not move the cursor.
 * Modifiers return `this` so calls chain:
 *
 *   d.add(new elm.Resistor().right().label('R1 = 2kΩ'));
 */

import {
  DIRECTION_ANGLES,
  add,
  isPoint,
  polar,
  transformPrimitive,
  type Direction,
  type Point,
  type Primitive,
} from './geometry.js';

export type LabelSide = 'top' | 'bottom';

interface ElementLabel {
  text: string;
  side: LabelSide;
}

export interface Placement {
  start: Point;
  end: Point;
  /** Heading in degrees, 0 = right, 90 = up */
  angle: number;
}

/** Element geometry is requested by modifiers, then fixed by Drawing.add() */
export interface ElementRequest {
  angle: number | null;
  length: number | null;
  at: Point | null;
  to: Point | null;
}

function line(...points: Point[]): Primitive {
  return { kind: 'polyline', points, closed: false, filled: false };
}

function checkPoint(method: string, value: unknown): Point {
  if (!isPoint(value)) {
    throw new TypeError(`${method}() expects an [x, y] pair of finite numbers`);
  }
  return [value[0], value[1]];
}

export abstract class Element {
  /** Whether adding this element moves the drawing cursor to its end */
  abstract readonly advancesCursor: boolean;

  protected readonly request: ElementRequest = { angle: null, length: null, at: null, to: null };
  protected readonly labels: ElementLabel[] = [];
  private placement: Placement | null = null;

  up(length?: number): this {
    return this.heading('up', length);
  }

  down(length?: number): this {
    return this.heading('down', length);
  }

  left(length?: number): this {
    return this.heading('left', length);
  }

  right(length?: number): this {
    return this.heading('right', length);
  }

  /** Heading in degrees counter-clockwise from "right" */
  theta(degrees: number): this {
    if (typeof degrees !== 'number' || !Number.isFinite(degrees)) {
      throw new TypeError('theta() expects a finite number of degrees');
    }
    this.request.angle = degrees;
    return this;
  }

  length(units: number): this {
    if (typeof units !== 'number' || !Number.isFinite(units) || units <= 0) {
      throw new TypeError('length() expects a positive number');
    }
    this.request.length = units;
    return this;
  }

  label(text: unknown, side: LabelSide = 'top'): this {
    if (side !== 'top' && side !== 'bottom') {
      throw new TypeError(`label() side must be 'top' or 'bottom', got ${String(side)}`);
    }
    this.labels.push({ text: String(text), side });
    return this;
  }

  /** Start at an explicit point instead of the cursor */
  at(point: Point): this {
    this.request.at = checkPoint('at', point);
    return this;
  }

  /** End at an explicit point; overrides heading and length */
  to(point: Point): this {
    this.request.to = checkPoint('to', point);
    return this;
  }

  get isPlaced(): boolean {
    return this.placement !== null;
  }

  get start(): Point {
    return this.placed().start;
  }

  get end(): Point {
    return this.placed().end;
  }

  get center(): Point {
    const { start, end } = this.placed();
    return [(start[0] + end[0]) / 2, (start[1] + end[1]) / 2];
  }

  getRequest(): Readonly<ElementRequest> {
    return this.request;
  }

  /** Called once by Drawing.add() */
  place(placement: Placement): void {
    if (this.placement) {
      throw new Error(`${this.constructor.name} has already been added to a drawing`);
    }
    this.placement = placement;
  }

  /** Primitives in drawing space */
  render(): Primitive[] {
    const { start, end, angle } = this.placed();
    const length = Math.hypot(end[0] - start[0], end[1] - start[1]);
    const body = this.body(length).map((p) => transformPrimitive(p, start, this.bodyAngle(angle)));
    return [...body, ...this.renderLabels()];
  }

  /** Symbol in local space: x along the element from 0 to `length` */
  protected abstract body(length: number): Primitive[];

  protected bodyAngle(angle: number): number {
    return angle;
  }

  /** Distance from the element axis to its labels */
  protected labelOffset(): number {
    return 0.55;
  }

  protected renderLabels(): Primitive[] {
    const { angle } = this.placed();
    // Canonical label side: above horizontal elements, left of vertical ones
    let normal = polar(1, angle + 90);
    if (normal[1] < -1e-9 || (Math.abs(normal[1]) <= 1e-9 && normal[0] > 0)) {
      normal = [-normal[0], -normal[1]];
    }

    return this.labels.map((l, i): Primitive => {
      const sign = l.side === 'top' ? 1 : -1;
      const distance = this.labelOffset() + i * 0.45;
      const at = add(this.center, [normal[0] * distance * sign, normal[1] * distance * sign]);
      const nx = normal[0] * sign;
      const anchor = Math.abs(nx) > 0.5 ? (nx < 0 ? 'end' : 'start') : 'middle';
      return { kind: 'text', at, text: l.text, anchor };
    });
  }

  private heading(direction: Direction, length?: number): this {
    this.request.angle = DIRECTION_ANGLES[direction];
    if (length !== undefined) this.length(length);
    return this;
  }

  private placed(): Placement {
    if (!this.placement) {
      throw new Error(`${this.constructor.name} has not been added to a drawing yet`);
    }
    return this.placement;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TWO-TERMINAL ELEMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export abstract class TwoTerminal extends Element {
  readonly advancesCursor = true;

  /** Length of the symbol between the leads */
  protected abstract readonly symbolLength: number;

  /** Start and end x of the symbol; leads fill 0..a and b..length */
  protected span(length: number): [number, number] {
    const s = Math.min(this.symbolLength, length);
    const a = (length - s) / 2;
    return [a, a + s];
  }

  protected leads(length: number): Primitive[] {
    const [a, b] = this.span(length);
    return [line([0, 0], [a, 0]), line([b, 0], [length, 0])];
  }
}

export class Line extends TwoTerminal {
  protected readonly symbolLength = 0;

  protected body(length: number): Primitive[] {
    return [line([0, 0], [length, 0])];
  }

  protected labelOffset(): number {
    return 0.3;
  }
}

export class Resistor extends TwoTerminal {
  protected readonly symbolLength = 1;

  protected body(length: number): Primitive[] {
    const [a, b] = this.span(length);
    const s = b - a;
    const zigzag: Point[] = [[a, 0]];
    for (let i = 0; i < 6; i++) {
      zigzag.push([a + (s * (2 * i + 1)) / 12, i % 2 === 0 ? 0.25 : -0.25]);
    }
    zigzag.push([b, 0]);
    return [...this.leads(length), line(...zigzag)];
  }
}

export class Capacitor extends TwoTerminal {
  protected readonly symbolLength = 0.25;

  protected body(length: number): Primitive[] {
    const [a, b] = this.span(length);
    return [...this.leads(length), line([a, -0.5], [a, 0.5]), line([b, -0.5], [b, 0.5])];
  }

  protected labelOffset(): number {
    return 0.8;
  }
}

export class Inductor extends TwoTerminal {
  protected readonly symbolLength = 1;

  protected body(length: number): Primitive[] {
    const [a, b] = this.span(length);
    const r = (b - a) / 8;
    const coil: Point[] = [];
    for (let loop = 0; loop < 4; loop++) {
      const cx = a + r * (2 * loop + 1);
      for (let step = 0; step <= 8; step++) {
        const t = Math.PI - (Math.PI * step) / 8;
        coil.push([cx + r * Math.cos(t), r * Math.sin(t)]);
      }
    }
    return [...this.leads(length), line(...coil)];
  }
}

/** Independent voltage source; the + terminal is at `end` */
export class SourceV extends TwoTerminal {
  protected readonly symbolLength = 1;

  protected body(length: number): Primitive[] {
    const c = length / 2;
    return [
      ...this.leads(length),
      { kind: 'circle', center: [c, 0], radius: 0.5, filled: false },
      // +
      line([c + 0.15, 0], [c + 0.35, 0]),
      line([c + 0.25, -0.1], [c + 0.25, 0.1]),
      // −
      line([c - 0.25, -0.1], [c - 0.25, 0.1]),
    ];
  }

  protected labelOffset(): number {
    return 0.85;
  }
}

/** Independent current source; the arrow points towards `end` */
export class SourceI extends TwoTerminal {
  protected readonly symbolLength = 1;

  protected body(length: number): Primitive[] {
    const c = length / 2;
    return [
      ...this.leads(length),
      { kind: 'circle', center: [c, 0], radius: 0.5, filled: false },
      line([c - 0.3, 0], [c + 0.15, 0]),
      { kind: 'polyline', points: [[c + 0.3, 0], [c + 0.1, 0.12], [c + 0.1, -0.12]], closed: true, filled: true },
    ];
  }

  protected labelOffset(): number {
    return 0.85;
  }
}

/** Battery; the long (+) plate faces `end` */
export class Battery extends TwoTerminal {
  protected readonly symbolLength = 0.2;

  protected body(length: number): Primitive[] {
    const [a, b] = this.span(length);
    return [...this.leads(length), line([a, -0.25], [a, 0.25]), line([b, -0.5], [b, 0.5])];
  }

  protected labelOffset(): number {
    return 0.8;
  }
}

/** Diode; conducts from `start` (anode) to `end` (cathode) */
export class Diode extends TwoTerminal {
  protected readonly symbolLength = 0.6;

  protected body(length: number): Primitive[] {
    const [a, b] = this.span(length);
    return [
      ...this.leads(length),
      { kind: 'polyline', points: [[a, -0.3], [a, 0.3], [b, 0]], closed: true, filled: false },
      line([b, -0.3], [b, 0.3]),
    ];
  }
}

/** Open single-pole switch */
export class Switch extends TwoTerminal {
  protected readonly symbolLength = 1;

  protected body(length: number): Primitive[] {
    const [a, b] = this.span(length);
    return [
      ...this.leads(length),
      { kind: 'circle', center: [a, 0], radius: 0.06, filled: false },
      { kind: 'circle', center: [b, 0], radius: 0.06, filled: false },
      line([a, 0], [a + (b - a) * 0.9, 0.4]),
    ];
  }

  protected labelOffset(): number {
    return 0.7;
  }
}

export class Lamp extends TwoTerminal {
  protected readonly symbolLength = 1;

  protected body(length: number): Primitive[] {
    const c = length / 2;
    const d = 0.35;
    return [
      ...this.leads(length),
      { kind: 'circle', center: [c, 0], radius: 0.5, filled: false },
      line([c - d, -d], [c + d, d]),
      line([c - d, d], [c + d, -d]),
    ];
  }

  protected labelOffset(): number {
    return 0.85;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ONE-TERMINAL ELEMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export abstract class OneTerminal extends Element {
  readonly advancesCursor = false;

  protected labelPosition(): Point {
    return [0.3, 0.3];
  }

  protected renderLabels(): Primitive[] {
    return this.labels.map((l, i): Primitive => ({
      kind: 'text',
      at: add(add(this.start, this.labelPosition()), [0, -0.45 * i]),
      text: l.text,
      anchor: 'start',
    }));
  }
}

/** Earth symbol hanging below its connection point */
export class Ground extends OneTerminal {
  protected body(): Primitive[] {
    return [
      line([0, 0], [0, -0.5]),
      line([-0.4, -0.5], [0.4, -0.5]),
      line([-0.25, -0.65], [0.25, -0.65]),
      line([-0.1, -0.8], [0.1, -0.8]),
    ];
  }

  // Always drawn pointing down
  protected bodyAngle(): number {
    return 0;
  }

  protected labelPosition(): Point {
    return [0.55, -0.65];
  }
}

/** Junction dot */
export class Dot extends OneTerminal {
  protected body(): Primitive[] {
    return [{ kind: 'circle', center: [0, 0], radius: 0.1, filled: true }];
  }

  protected bodyAngle(): number {
    return 0;
  }
}
