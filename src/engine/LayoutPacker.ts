/**
 * Layout Packer - Arrange finished strips on the printable sheet
 *
 * Per strip: shrink each face inward, turn the strip so its narrowest
 * direction runs across the tape, centre it in the tape band. Strips are then
 * laid left to right `gap` apart, the whole set is repeated `duplicates`
 * times along x, and everything is framed by `margin`.
 *
 * Sheet coordinates have their origin at the bottom-left corner with y up.
 * The result depends only on its inputs, so repeated runs are bit-identical.
 */

import type { Bounds2D, Layout, LayoutFace, LayoutPiece, Point2D, Strip } from './types';
import { LayoutOverflowError } from './errors';
import { insetConvexPolygon, unionPolygons } from '../utils/polygonBoolean';
import { computeBounds, minimumWidth, rotatePoint, WIDTH_TOLERANCE } from '../utils/ribbonMetrics';
import { debug } from '../utils/debug';

// =============================================================================
// Types
// =============================================================================

export interface LayoutOptions {
  tapeWidth: number;
  /** Inward offset applied to every face (mm) */
  shrink: number;
  gap: number;
  margin: number;
  duplicates: number;
  maxSheetWidth?: number;
  maxSheetHeight?: number;
}

/**
 * A strip turned and shifted into its own band: x from 0, y centred in
 * [0, tapeWidth].
 */
interface OrientedStrip {
  stripId: number;
  faces: LayoutFace[];
  outline: Point2D[][];
  width: number;
}

// =============================================================================
// Helpers
// =============================================================================

function shrinkFaces(strip: Strip, shrink: number): LayoutFace[] {
  return strip.faces.map((face) => {
    const inset = insetConvexPolygon(face.points, shrink);
    if (!inset) {
      debug('layout', `Strip ${strip.id}: shrink ${shrink}mm collapses face ${face.faceId}; keeping its outline`);
      return { faceId: face.faceId, points: face.points.map((p) => ({ ...p })) };
    }
    return { faceId: face.faceId, points: inset };
  });
}

function orientStrip(strip: Strip, options: LayoutOptions): OrientedStrip {
  const faces = shrinkFaces(strip, options.shrink);
  const allPoints = faces.flatMap((f) => f.points);
  const { angle } = minimumWidth(allPoints);

  // Lay the narrowest hull edge along +x so the ribbon width becomes the height
  const rotated = faces.map((f) => ({ faceId: f.faceId, points: f.points.map((p) => rotatePoint(p, -angle)) }));
  const bounds = computeBounds(rotated.flatMap((f) => f.points));
  const height = bounds.maxY - bounds.minY;

  if (height > options.tapeWidth + WIDTH_TOLERANCE) {
    throw new LayoutOverflowError(
      `Strip ${strip.id} is ${height.toFixed(3)}mm wide; tape is ${options.tapeWidth}mm`,
      { stripId: strip.id, stripWidth: height, tapeWidth: options.tapeWidth }
    );
  }

  const dy = (options.tapeWidth - height) / 2 - bounds.minY;
  const dx = -bounds.minX;
  const shifted: LayoutFace[] = rotated.map((f) => ({
    faceId: f.faceId,
    points: f.points.map((p) => ({ x: p.x + dx, y: p.y + dy })),
  }));

  let outline = unionPolygons(shifted.map((f) => f.points))?.flat();
  if (!outline) {
    debug('layout', `Strip ${strip.id}: union failed; using face outlines`);
    outline = shifted.map((f) => f.points);
  }

  return { stripId: strip.id, faces: shifted, outline, width: bounds.maxX - bounds.minX };
}

const translate = (p: Point2D, dx: number, dy: number): Point2D => ({ x: p.x + dx, y: p.y + dy });

function translatePiece(strip: OrientedStrip, copyIndex: number, dx: number, dy: number): LayoutPiece {
  const faces = strip.faces.map((f) => ({ faceId: f.faceId, points: f.points.map((p) => translate(p, dx, dy)) }));
  const bounds: Bounds2D = computeBounds(faces.flatMap((f) => f.points));
  return {
    stripId: strip.stripId,
    copyIndex,
    faces,
    outline: strip.outline.map((ring) => ring.map((p) => translate(p, dx, dy))),
    bounds,
  };
}

// =============================================================================
// Packer
// =============================================================================

/**
 * Place strips on the sheet.
 *
 * @throws LayoutOverflowError if a strip is wider than the tape or the sheet
 *   exceeds a configured maximum
 */
export function packLayout(strips: Strip[], options: LayoutOptions): Layout {
  const { gap, margin, duplicates, tapeWidth } = options;

  const oriented = strips.map((strip) => orientStrip(strip, options));

  // Left to right within one copy
  const offsets: number[] = [];
  let cursor = 0;
  for (const strip of oriented) {
    offsets.push(cursor);
    cursor += strip.width + gap;
  }
  const copyWidth = oriented.length > 0 ? cursor - gap : 0;
  const pitch = copyWidth + gap;

  const pieces: LayoutPiece[] = [];
  for (let copy = 0; copy < duplicates; copy++) {
    oriented.forEach((strip, i) => {
      pieces.push(translatePiece(strip, copy, margin + offsets[i] + copy * pitch, margin));
    });
  }

  const sheetWidth = oriented.length > 0
    ? duplicates * copyWidth + (duplicates - 1) * gap + 2 * margin
    : 2 * margin;
  const sheetHeight = tapeWidth + 2 * margin;

  if (options.maxSheetWidth !== undefined && sheetWidth > options.maxSheetWidth + WIDTH_TOLERANCE) {
    throw new LayoutOverflowError(
      `Sheet is ${sheetWidth.toFixed(3)}mm wide; limit is ${options.maxSheetWidth}mm`,
      { sheetWidth, maxSheetWidth: options.maxSheetWidth, strips: strips.length, duplicates }
    );
  }
  if (options.maxSheetHeight !== undefined && sheetHeight > options.maxSheetHeight + WIDTH_TOLERANCE) {
    throw new LayoutOverflowError(
      `Sheet is ${sheetHeight.toFixed(3)}mm tall; limit is ${options.maxSheetHeight}mm`,
      { sheetHeight, maxSheetHeight: options.maxSheetHeight }
    );
  }

  debug('layout', `Packed ${strips.length} strip(s) × ${duplicates}: sheet ${sheetWidth.toFixed(2)} × ${sheetHeight.toFixed(2)}mm`);

  return { pieces, sheetWidth, sheetHeight, copyWidth, duplicates };
}

/**
 * Every face polygon on the sheet, in piece order.
 */
export function layoutPolygons(layout: Layout): Point2D[][] {
  return layout.pieces.flatMap((piece) => piece.faces.map((f) => f.points));
}
