/**
 * SVG Export Utility
 *
 * Renders a packed layout as a cut file in millimetres. Sheet coordinates
 * have y growing upward; SVG's y grows downward, so y is flipped against
 * the sheet height.
 */

import type { Layout, Point2D } from '../engine/types';

export interface LayoutSvgOptions {
  /** Cut line width in mm (default: 0.1) */
  strokeWidth?: number;
  /** Draw dashed face boundaries inside each strip (default: false) */
  foldLines?: boolean;
}

const fmt = (v: number): string => v.toFixed(3);

// Convert points to SVG path data, flipping y against the sheet height
export const pointsToSVGPath = (points: Point2D[], sheetHeight: number): string => {
  if (points.length === 0) return '';

  let path = `M ${fmt(points[0].x)} ${fmt(sheetHeight - points[0].y)} `;
  for (let i = 1; i < points.length; i++) {
    path += `L ${fmt(points[i].x)} ${fmt(sheetHeight - points[i].y)} `;
  }
  path += 'Z';
  return path;
};

/**
 * Generate the SVG document for a layout: one closed path per outline ring
 * of every piece, plus optional fold lines.
 */
export const generateLayoutSVG = (layout: Layout, options: LayoutSvgOptions = {}): string => {
  const strokeWidth = options.strokeWidth ?? 0.1;
  const { sheetWidth, sheetHeight } = layout;

  let svg = `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg"
     width="${fmt(sheetWidth)}mm"
     height="${fmt(sheetHeight)}mm"
     viewBox="0 0 ${fmt(sheetWidth)} ${fmt(sheetHeight)}">
  <title>Ribbon Layout</title>
  <g stroke="#000" stroke-width="${strokeWidth}" fill="none">
`;

  for (const piece of layout.pieces) {
    for (const ring of piece.outline) {
      svg += `    <path d="${pointsToSVGPath(ring, sheetHeight)}" />\n`;
    }
  }
  svg += '  </g>\n';

  if (options.foldLines) {
    svg += `  <g stroke="#888" stroke-width="${strokeWidth}" stroke-dasharray="1 1" fill="none">\n`;
    for (const piece of layout.pieces) {
      if (piece.faces.length < 2) continue;
      for (const face of piece.faces) {
        svg += `    <path d="${pointsToSVGPath(face.points, sheetHeight)}" />\n`;
      }
    }
    svg += '  </g>\n';
  }

  svg += '</svg>\n';
  return svg;
};
