/**
 * Drawing: places elements end-to-end from a moving cursor.
 *
 *   const d = new schematic.Drawing();
 *   d.add(new elm.SourceV().up().label('12V'));
 *   d.add(new elm.Resistor().right().label('R1'));
 *   d.push();                      // remember this corner
 *   d.add(new elm.Resistor().down().label('R2'));
 *   d.pop();                       // back to the corner
 *   d.draw();
 *
 * An element without a heading continues in the direction of the previous
 * one (initially right). Two-terminal elements move the cursor to their
 * end; Ground and Dot leave it where it is.
 */

import { Element } from './elements.js';
import { setActiveFigure } from './figure-state.js';
import { angleOf, distance, isPoint, polar, add as addPoints, type Point, type Primitive } from './geometry.js';
import { DEFAULT_SVG_OPTIONS, renderSvg, type SvgOptions } from './svg.js';

export interface DrawingOptions {
  /** Default length of two-terminal elements, in drawing units */
  unit?: number;
}

interface CursorState {
  position: Point;
  heading: number;
}

export const DEFAULT_UNIT = 3;
const MAX_ELEMENTS = 1000;

export class Drawing {
  readonly unit: number;
  private cursor: CursorState = { position: [0, 0], heading: 0 };
  private readonly stack: CursorState[] = [];
  private readonly placed: Element[] = [];

  constructor(options: DrawingOptions = {}) {
    const unit = options.unit ?? DEFAULT_UNIT;
    if (typeof unit !== 'number' || !Number.isFinite(unit) || unit <= 0) {
      throw new TypeError('Drawing unit must be a positive number');
    }
    this.unit = unit;
  }

  /** Cursor position */
  get here(): Point {
    return this.cursor.position;
  }

  get elements(): readonly Element[] {
    return this.placed;
  }

  /**
   * Place `element` and advance the cursor. Returns the element so its
   * anchors (start, end, center) can be used for later placements.
   */
  add<T extends Element>(element: T): T {
    if (!(element instanceof Element)) {
      throw new TypeError('Drawing.add() expects a schematic element, e.g. new elm.Resistor()');
    }
    if (this.placed.length >= MAX_ELEMENTS) {
      throw new Error(`Drawing is limited to ${MAX_ELEMENTS} elements`);
    }

    const request = element.getRequest();
    const start = request.at ?? this.cursor.position;

    if (!element.advancesCursor) {
      element.place({ start, end: start, angle: 0 });
      this.placed.push(element);
      return element;
    }

    let end: Point;
    let angle: number;
    if (request.to) {
      if (distance(start, request.to) === 0) {
        throw new Error(`${element.constructor.name} cannot start and end at the same point`);
      }
      end = request.to;
      angle = angleOf(start, end);
    } else {
      angle = request.angle ?? this.cursor.heading;
      end = addPoints(start, polar(request.length ?? this.unit, angle));
    }

    element.place({ start, end, angle });
    this.placed.push(element);
    this.cursor = { position: end, heading: angle };
    return element;
  }

  /** Save the cursor position and heading */
  push(): this {
    this.stack.push({ ...this.cursor });
    return this;
  }

  /** Restore the last pushed cursor */
  pop(): this {
    const saved = this.stack.pop();
    if (!saved) throw new Error('Drawing.pop() called without a matching push()');
    this.cursor = saved;
    return this;
  }

  /** Move the cursor without drawing */
  move(dx: number, dy: number): this {
    const delta: unknown = [dx, dy];
    if (!isPoint(delta)) throw new TypeError('move() expects two finite numbers');
    this.cursor = { ...this.cursor, position: addPoints(this.cursor.position, delta) };
    return this;
  }

  /** Make this the figure the compiler renders */
  draw(): this {
    setActiveFigure(this);
    return this;
  }

  primitives(): Primitive[] {
    return this.placed.flatMap((e) => e.render());
  }

  toSvg(options: SvgOptions = DEFAULT_SVG_OPTIONS): string {
    return renderSvg(this.primitives(), options);
  }
}
