import type { ArrowGeometry, ArrowSpec, Direction, Extent, LineSegment, Vector2 } from '../types/tooltip';
import { isVerticalDirection } from '../types/tooltip';

/**
 * Box the arrow is drawn in. The extrusion (arrowHeight) runs along the
 * placement axis, plus the overlap strip that sits under the tooltip body.
 */
export function arrowBoxExtent(
  direction: Direction,
  arrowWidth: number,
  arrowHeight: number,
  overlap: number
): Extent {
  const depth = arrowHeight + overlap;
  return isVerticalDirection(direction)
    ? { width: arrowWidth, height: depth }
    : { width: depth, height: arrowWidth };
}

// Outline as [outer corner, base corner, tip, base corner, outer corner].
// Outer corners lie on the body edge; base corners sit `overlap` away from it.
function outline(direction: Direction, { width: w, height: h }: Extent, o: number): Vector2[] {
  switch (direction) {
    case 'up':
      // Body above, tip points down
      return [
        { x: 0, y: 0 },
        { x: 0, y: o },
        { x: w / 2, y: h },
        { x: w, y: o },
        { x: w, y: 0 },
      ];
    case 'down':
      return [
        { x: 0, y: h },
        { x: 0, y: h - o },
        { x: w / 2, y: 0 },
        { x: w, y: h - o },
        { x: w, y: h },
      ];
    case 'left':
      // Body on the left, tip points right
      return [
        { x: 0, y: 0 },
        { x: o, y: 0 },
        { x: w, y: h / 2 },
        { x: o, y: h },
        { x: 0, y: h },
      ];
    case 'right':
      return [
        { x: w, y: 0 },
        { x: w - o, y: 0 },
        { x: 0, y: h / 2 },
        { x: w - o, y: h },
        { x: w, y: h },
      ];
  }
}

export function buildArrowGeometry(spec: ArrowSpec): ArrowGeometry {
  const fill = outline(spec.direction, spec.boxExtent, spec.overlap);
  const [, baseStart, tip, baseEnd] = fill;

  // The base never gets stroked so it merges with the body's own border
  const strokeSegments: LineSegment[] = spec.hasStroke
    ? [
        { from: baseStart, to: tip },
        { from: tip, to: baseEnd },
      ]
    : [];

  return {
    direction: spec.direction,
    boxExtent: spec.boxExtent,
    overlap: spec.overlap,
    fill,
    strokeSegments,
    strokeWidth: spec.hasStroke ? spec.strokeWidth : 0,
  };
}

function formatCoord(value: number): string {
  // Trim float noise so paths stay stable across renders
  return String(Math.round(value * 1000) / 1000);
}

/** SVG path data for a vertex sequence */
export function toSvgPath(points: readonly Vector2[], close: boolean): string {
  if (points.length === 0) return '';
  const [first, ...rest] = points;
  const parts = [`M${formatCoord(first.x)} ${formatCoord(first.y)}`];
  for (const p of rest) {
    parts.push(`L${formatCoord(p.x)} ${formatCoord(p.y)}`);
  }
  if (close) parts.push('Z');
  return parts.join(' ');
}

export function strokeSegmentsToSvgPath(segments: readonly LineSegment[]): string {
  return segments.map((s) => toSvgPath([s.from, s.to], false)).join(' ');
}
