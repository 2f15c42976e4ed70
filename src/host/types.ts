// Contract between the tooltip session and whatever renders it

import type { ArrowGeometry, AnchorGeometry, Direction, Extent, Vector2 } from '../types/tooltip';

export interface TooltipAppearance {
  backgroundColor: string;
  cornerRadius: number;
  borderColor: string | null;
  borderWidth: number;
}

/** Everything needed to render a tooltip except where it goes */
export interface TooltipDrawable<TContent> {
  content: TContent;
  direction: Direction;
  /** Width constraint for the body */
  maxWidth: number;
  arrow: ArrowGeometry;
  appearance: TooltipAppearance;
}

export interface PositionedTooltip<TContent> extends TooltipDrawable<TContent> {
  origin: Vector2;
  /** Measured size of body plus arrow */
  extent: Extent;
}

export interface OverlayCallbacks {
  /** Pointer went down outside the tooltip body */
  onOutsideTap: () => void;
  /** The anchor handles its own taps (it toggles), so they are not outside taps */
  ignoreAnchorTaps: boolean;
}

export interface OverlayHandle {
  readonly id: number;
}

export type Unsubscribe = () => void;
export type CancelScheduled = () => void;

/**
 * Host services the session relies on. Implementations report unavailable
 * state with null rather than throwing.
 */
export interface TooltipHost<TContent, TAncestor = unknown> {
  /** Render the drawable at `origin` without showing it; null when nothing can be rendered */
  measureOffscreen(drawable: TooltipDrawable<TContent>, origin: Vector2): Promise<Extent | null>;
  getAnchorGeometry(): AnchorGeometry | null;
  getViewportExtent(): Extent;
  /** Ancestors of the anchor that can currently scroll, nearest first */
  findScrollableAncestors(): TAncestor[];
  subscribeScroll(ancestor: TAncestor, onScroll: () => void): Unsubscribe;
  mountOverlay(overlay: PositionedTooltip<TContent>, callbacks: OverlayCallbacks): OverlayHandle;
  unmountOverlay(handle: OverlayHandle): void;
  schedule(delayMs: number, callback: () => void): CancelScheduled;
}
