import type {
  Direction,
  Extent,
  FitResult,
  PlacementRequest,
  PlacementResult,
  Vector2,
} from '../types/tooltip';
import { isVerticalDirection, oppositeDirection } from '../types/tooltip';

/** Minimum clearance between the tooltip box and any viewport edge */
export const MIN_EDGE_MARGIN = 16;

/** Narrowest width the tooltip body is ever constrained to */
export const MIN_CONTENT_WIDTH = 100;

export function computeFit(request: PlacementRequest): FitResult {
  const { viewport, anchorOrigin, anchorExtent, contentExtent, margin } = request;
  return {
    above: anchorOrigin.y - contentExtent.height - margin > MIN_EDGE_MARGIN,
    below:
      anchorOrigin.y + anchorExtent.height + contentExtent.height + margin <
      viewport.height - MIN_EDGE_MARGIN,
    left: anchorOrigin.x - contentExtent.width - margin > MIN_EDGE_MARGIN,
    right:
      anchorOrigin.x + anchorExtent.width + contentExtent.width + margin <
      viewport.width - MIN_EDGE_MARGIN,
  };
}

function fitsIn(fit: FitResult, direction: Direction): boolean {
  switch (direction) {
    case 'up':
      return fit.above;
    case 'down':
      return fit.below;
    case 'left':
      return fit.left;
    case 'right':
      return fit.right;
  }
}

/**
 * One-shot flip: the opposite side is used only when the preferred side lacks
 * room and the opposite side has it. The orthogonal axis is never tried.
 */
export function resolveDirection(preferred: Direction, fit: FitResult): Direction {
  const opposite = oppositeDirection(preferred);
  if (!fitsIn(fit, preferred) && fitsIn(fit, opposite)) {
    return opposite;
  }
  return preferred;
}

export function computeTooltipOriginUnclamped(
  request: PlacementRequest,
  direction: Direction
): Vector2 {
  const { anchorOrigin, anchorExtent, contentExtent, margin } = request;
  const centeredLeft = anchorOrigin.x + anchorExtent.width / 2 - contentExtent.width / 2;
  const centeredTop = anchorOrigin.y + anchorExtent.height / 2 - contentExtent.height / 2;

  switch (direction) {
    case 'up':
      return { x: centeredLeft, y: anchorOrigin.y - contentExtent.height - margin };
    case 'down':
      return { x: centeredLeft, y: anchorOrigin.y + anchorExtent.height + margin };
    case 'left':
      return { x: anchorOrigin.x - contentExtent.width - margin, y: centeredTop };
    case 'right':
      return { x: anchorOrigin.x + anchorExtent.width + margin, y: centeredTop };
  }
}

function clampAxis(value: number, content: number, viewport: number): number {
  const max = viewport - content - MIN_EDGE_MARGIN;
  // Content larger than the usable region sticks to the leading edge margin
  if (max <= MIN_EDGE_MARGIN) return MIN_EDGE_MARGIN;
  return Math.min(Math.max(value, MIN_EDGE_MARGIN), max);
}

export function clampTooltipOriginToViewport(
  origin: Vector2,
  contentExtent: Extent,
  viewport: Extent
): Vector2 {
  return {
    x: clampAxis(origin.x, contentExtent.width, viewport.width),
    y: clampAxis(origin.y, contentExtent.height, viewport.height),
  };
}

/**
 * Decide where the tooltip goes. Pure: the request fully determines the result.
 * Negative extents are not validated.
 */
export function placeTooltip(request: PlacementRequest): PlacementResult {
  const actualDirection = resolveDirection(request.preferredDirection, computeFit(request));
  const finalOrigin = clampTooltipOriginToViewport(
    computeTooltipOriginUnclamped(request, actualDirection),
    request.contentExtent,
    request.viewport
  );
  return { finalOrigin, actualDirection };
}

export interface ContentWidthOptions {
  mainAxisWidth: number | null;
  sideAxisWidth: number | null;
}

/**
 * Max width of the tooltip body. Above/below tooltips default to the viewport
 * minus both edge margins, side tooltips to half the viewport.
 */
export function contentMaxWidth(
  direction: Direction,
  viewportWidth: number,
  options: ContentWidthOptions
): number {
  const width = isVerticalDirection(direction)
    ? options.mainAxisWidth ?? viewportWidth - 2 * MIN_EDGE_MARGIN
    : options.sideAxisWidth ?? viewportWidth * 0.5;
  return Math.max(MIN_CONTENT_WIDTH, width);
}
