/**
 * Diagram Sandbox
 *
 * Runs generated diagram code against the schematic library in a fresh vm
 * context and renders the resulting figure to PNG. Never throws: every
 * failure comes back as a DiagramFailure with the message, stack and
 * captured console output.
 *
 * The context's only globals are `schematic`, `elm` and a capturing
 * `console`, but the library objects belong to this realm, so code that
 * walks their prototypes reaches this process. Only the render worker calls
 * runDiagramProgram, one program per worker process.
 *
 * @module services/diagram/sandbox
 */

import { Resvg } from '@resvg/resvg-js';
import { inspect } from 'util';
import vm from 'vm';
import type { DiagramFailure, DiagramResult } from '../../models/envelope.js';
import { ExecutionError } from '../errors.js';
import {
  elm,
  getActiveFigure,
  renderSvg,
  schematic,
  svgSize,
  withRenderContext,
} from './schematic/index.js';

export interface SandboxOptions {
  /** Output resolution; SVG user units are treated as 96 dpi */
  dpi: number;
  /** Wall-clock limit for running the code, microtasks included */
  timeoutMs: number;
}

const SCRIPT_FILENAME = 'diagram.js';
const SVG_DPI = 96;
const MAX_CAPTURE_LENGTH = 65_536;

/** Largest raster the compiler will allocate (4096 x 4096) */
export const MAX_RASTER_PIXELS = 4096 * 4096;

interface Thrown {
  message: string;
  stack: string;
}

/**
 * Message and stack of any thrown value. Errors raised inside the vm context
 * come from another realm, so `instanceof Error` does not apply.
 */
export function describeThrown(error: unknown): Thrown {
  if (typeof error === 'object' && error !== null) {
    const message =
      'message' in error && typeof error.message === 'string' ? error.message : inspect(error);
    const stack = 'stack' in error && typeof error.stack === 'string' ? error.stack : message;
    return { message, stack };
  }
  const text = String(error);
  return { message: text, stack: text };
}

export function diagramFailure(
  error: unknown,
  code: string,
  stdout: string,
  stderr: string
): DiagramFailure {
  const { message, stack } = describeThrown(error);
  return {
    success: false,
    error: `Error executing diagram code: ${message}`,
    traceback: stack,
    stdout,
    stderr,
    diagram_code: code,
  };
}

class OutputCapture {
  private text = '';

  write(args: unknown[]): void {
    if (this.text.length >= MAX_CAPTURE_LENGTH) return;
    const line = args.map((a) => (typeof a === 'string' ? a : inspect(a, { depth: 2 }))).join(' ');
    this.text += line + '\n';
    if (this.text.length > MAX_CAPTURE_LENGTH) {
      this.text = this.text.slice(0, MAX_CAPTURE_LENGTH) + '\n[output truncated]\n';
    }
  }

  toString(): string {
    return this.text;
  }
}

function execute(code: string, timeoutMs: number, stdout: OutputCapture, stderr: OutputCapture): void {
  const sandboxConsole = Object.freeze({
    log: (...args: unknown[]) => stdout.write(args),
    info: (...args: unknown[]) => stdout.write(args),
    warn: (...args: unknown[]) => stderr.write(args),
    error: (...args: unknown[]) => stderr.write(args),
  });

  const context = vm.createContext(
    { schematic, elm, console: sandboxConsole },
    {
      name: 'diagram',
      codeGeneration: { strings: false, wasm: false },
      microtaskMode: 'afterEvaluate',
    }
  );

  const script = new vm.Script(code, { filename: SCRIPT_FILENAME });
  script.runInContext(context, { timeout: timeoutMs });
}

/**
 * Rasterize at `dpi`, refusing figures whose raster would exceed
 * MAX_RASTER_PIXELS before resvg allocates it.
 */
export function rasterize(svg: string, width: number, height: number, dpi: number): Buffer {
  const zoom = dpi / SVG_DPI;
  const pixelWidth = Math.ceil(width * zoom);
  const pixelHeight = Math.ceil(height * zoom);
  if (pixelWidth * pixelHeight > MAX_RASTER_PIXELS) {
    throw new ExecutionError(
      `figure is ${pixelWidth}x${pixelHeight} px at ${dpi} dpi, which exceeds the raster limit ` +
        `of ${MAX_RASTER_PIXELS} px; keep coordinates and lengths small`,
      { pixelWidth, pixelHeight, dpi }
    );
  }

  try {
    const resvg = new Resvg(svg, {
      fitTo: { mode: 'zoom', value: zoom },
      background: 'white',
      font: { loadSystemFonts: true },
    });
    return resvg.render().asPng();
  } catch (error) {
    throw new ExecutionError(`failed to rasterize figure: ${describeThrown(error).message}`, undefined, {
      cause: error,
    });
  }
}

export function runDiagramProgram(code: string, options: SandboxOptions): DiagramResult {
  const stdout = new OutputCapture();
  const stderr = new OutputCapture();

  try {
    const png = withRenderContext(() => {
      execute(code, options.timeoutMs, stdout, stderr);
      const figure = getActiveFigure();
      if (!figure) {
        throw new ExecutionError('no figure was drawn (call draw() on the Drawing)');
      }
      if (figure.elements.length === 0) {
        throw new ExecutionError('the drawn figure has no elements');
      }
      const primitives = figure.primitives();
      const { width, height } = svgSize(primitives);
      return rasterize(renderSvg(primitives), width, height, options.dpi);
    });

    return {
      success: true,
      image_base64: png.toString('base64'),
      stdout: stdout.toString(),
      stderr: stderr.toString(),
      diagram_code: code,
    };
  } catch (error) {
    return diagramFailure(error, code, stdout.toString(), stderr.toString());
  }
}
