/**
 * Process-wide "current figure", set by Drawing.draw() and read by the
 * diagram compiler. Compiles are synchronous, so one figure is live at a
 * time; the compiler resets this after every run.
 */

import type { Drawing } from './drawing.js';

let activeFigure: Drawing | null = null;

export function setActiveFigure(drawing: Drawing): void {
  activeFigure = drawing;
}

export function getActiveFigure(): Drawing | null {
  return activeFigure;
}

export function resetFigureState(): void {
  activeFigure = null;
}

let renderContextHeld = false;

/**
 * Run `fn` with a clean figure state and reset it afterwards, whether `fn`
 * returns or throws. `fn` must be synchronous.
 *
 * @throws Error if called from inside another render context
 */
export function withRenderContext<T>(fn: () => T): T {
  if (renderContextHeld) {
    throw new Error('Render context is already held; diagram compiles cannot nest');
  }
  renderContextHeld = true;
  resetFigureState();
  try {
    return fn();
  } finally {
    resetFigureState();
    renderContextHeld = false;
  }
}
