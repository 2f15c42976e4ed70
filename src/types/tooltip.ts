// Geometry and session types shared by the placement engine, the arrow builder
// and the host adapters. Screen space: origin top-left, y grows downward.

export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

export interface Extent {
  readonly width: number;
  readonly height: number;
}

export interface AnchorGeometry {
  origin: Vector2;
  extent: Extent;
}

/** Side of the anchor the tooltip body is placed on */
export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

const OPPOSITE: Record<Direction, Direction> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

export function oppositeDirection(direction: Direction): Direction {
  return OPPOSITE[direction];
}

export function isVerticalDirection(direction: Direction): boolean {
  return direction === 'up' || direction === 'down';
}

export function isDirection(value: unknown): value is Direction {
  return DIRECTIONS.some((direction) => direction === value);
}

export interface PlacementRequest {
  viewport: Extent;
  anchorOrigin: Vector2;
  anchorExtent: Extent;
  contentExtent: Extent;
  preferredDirection: Direction;
  /** Gap between anchor and tooltip, >= 0 */
  margin: number;
}

export interface PlacementResult {
  finalOrigin: Vector2;
  actualDirection: Direction;
}

export interface FitResult {
  above: boolean;
  below: boolean;
  left: boolean;
  right: boolean;
}

export interface ArrowSpec {
  direction: Direction;
  boxExtent: Extent;
  /** Extension of the arrow base into the tooltip body */
  overlap: number;
  strokeWidth: number;
  hasStroke: boolean;
}

export interface LineSegment {
  from: Vector2;
  to: Vector2;
}

export interface ArrowGeometry {
  direction: Direction;
  boxExtent: Extent;
  overlap: number;
  /** Closed outline, base corners first */
  fill: Vector2[];
  /** Empty, or exactly the two edges running to the tip */
  strokeSegments: LineSegment[];
  strokeWidth: number;
}

export type TooltipSessionState = 'idle' | 'measuring' | 'visible';
