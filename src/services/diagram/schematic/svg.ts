/**
 * SVG serialization for schematic primitives.
 */

import type { Point, Primitive } from './geometry.js';

export interface SvgOptions {
  /** Pixels per drawing unit */
  scale: number;
  /** Blank border in drawing units */
  margin: number;
  fontSize: number;
  strokeWidth: number;
}

export const DEFAULT_SVG_OPTIONS: SvgOptions = {
  scale: 32,
  margin: 0.6,
  fontSize: 14,
  strokeWidth: 2,
};

interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

const TEXT_CHAR_WIDTH_EM = 0.6;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function fmt(n: number): string {
  return String(Math.round(n * 100) / 100);
}

/** Drawing-space extent of every primitive, labels estimated from text length */
export function computeBounds(primitives: Primitive[], options: SvgOptions): Bounds {
  const b: Bounds = { minX: Infinity, minY: Infinity, maxX: -Infinity, maxY: -Infinity };
  const include = ([x, y]: Point): void => {
    b.minX = Math.min(b.minX, x);
    b.minY = Math.min(b.minY, y);
    b.maxX = Math.max(b.maxX, x);
    b.maxY = Math.max(b.maxY, y);
  };

  for (const p of primitives) {
    switch (p.kind) {
      case 'polyline':
        p.points.forEach(include);
        break;
      case 'circle':
        include([p.center[0] - p.radius, p.center[1] - p.radius]);
        include([p.center[0] + p.radius, p.center[1] + p.radius]);
        break;
      case 'text': {
        const width = (p.text.length * options.fontSize * TEXT_CHAR_WIDTH_EM) / options.scale;
        const height = options.fontSize / options.scale;
        const left =
          p.anchor === 'start' ? p.at[0] : p.anchor === 'end' ? p.at[0] - width : p.at[0] - width / 2;
        include([left, p.at[1] - height / 2]);
        include([left + width, p.at[1] + height / 2]);
        break;
      }
    }
  }

  if (!Number.isFinite(b.minX)) {
    return { minX: 0, minY: 0, maxX: 0, maxY: 0 };
  }
  return b;
}

/** Width and height of the SVG document renderSvg would produce, in user units */
export function svgSize(
  primitives: Primitive[],
  options: SvgOptions = DEFAULT_SVG_OPTIONS
): { width: number; height: number } {
  const bounds = computeBounds(primitives, options);
  return {
    width: (bounds.maxX - bounds.minX + 2 * options.margin) * options.scale,
    height: (bounds.maxY - bounds.minY + 2 * options.margin) * options.scale,
  };
}

/**
 * Serialize primitives to a standalone SVG document (white background,
 * black strokes). Drawing-space y is flipped so "up" renders upwards.
 */
export function renderSvg(primitives: Primitive[], options: SvgOptions = DEFAULT_SVG_OPTIONS): string {
  const bounds = computeBounds(primitives, options);
  const { scale, margin } = options;
  const { width, height } = svgSize(primitives, options);

  const px = ([x, y]: Point): [string, string] => [
    fmt((x - bounds.minX + margin) * scale),
    fmt((bounds.maxY - y + margin) * scale),
  ];

  const body: string[] = [];
  for (const p of primitives) {
    switch (p.kind) {
      case 'polyline': {
        const points = p.points.map((pt) => px(pt).join(',')).join(' ');
        const tag = p.closed ? 'polygon' : 'polyline';
        const fill = p.filled ? 'black' : 'none';
        body.push(`<${tag} points="${points}" fill="${fill}"/>`);
        break;
      }
      case 'circle': {
        const [cx, cy] = px(p.center);
        const fill = p.filled ? 'black' : 'white';
        body.push(`<circle cx="${cx}" cy="${cy}" r="${fmt(p.radius * scale)}" fill="${fill}"/>`);
        break;
      }
      case 'text': {
        const [x, y] = px(p.at);
        // Shift the baseline so the text is vertically centred on its anchor point
        const baseline = fmt(Number(y) + options.fontSize * 0.35);
        body.push(
          `<text x="${x}" y="${baseline}" text-anchor="${p.anchor}" stroke="none" fill="black">${escapeXml(p.text)}</text>`
        );
        break;
      }
    }
  }

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(width)}" height="${fmt(height)}" viewBox="0 0 ${fmt(width)} ${fmt(height)}">`,
    `<rect width="100%" height="100%" fill="white"/>`,
    `<g stroke="black" stroke-width="${options.strokeWidth}" stroke-linejoin="round" stroke-linecap="round" font-family="DejaVu Sans, Arial, sans-serif" font-size="${options.fontSize}">`,
    ...body,
    '</g>',
    '</svg>',
  ].join('\n');
}
