/**
 * schematic - a small circuit-drawing library for generated diagram code.
 *
 * Generated programs see two globals: `schematic` (Drawing) and `elm` (the
 * element classes).
 *
 * @module services/diagram/schematic
 */

import { Drawing } from './drawing.js';
import {
  Battery,
  Capacitor,
  Diode,
  Ground,
  Inductor,
  Lamp,
  Line,
  Resistor,
  SourceI,
  SourceV,
  Switch,
  Dot,
} from './elements.js';

export { Drawing, DEFAULT_UNIT, type DrawingOptions } from './drawing.js';
export { Element, TwoTerminal, OneTerminal, type LabelSide } from './elements.js';
export { getActiveFigure, resetFigureState, setActiveFigure, withRenderContext } from './figure-state.js';
export { renderSvg, svgSize, DEFAULT_SVG_OPTIONS, type SvgOptions } from './svg.js';
export type { Point, Primitive, Direction } from './geometry.js';

export const elm = Object.freeze({
  Line,
  Resistor,
  Capacitor,
  Inductor,
  SourceV,
  SourceI,
  Battery,
  Diode,
  Switch,
  Lamp,
  Ground,
  Dot,
});

export const schematic = Object.freeze({ Drawing, elm });
