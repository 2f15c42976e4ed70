export { Tooltip, type TooltipHandle, type TooltipProps } from './components/Tooltip';
export { TooltipBubble, TooltipArrowShape } from './components/TooltipBubble';
export { ErrorBoundary } from './components/ErrorBoundary';
export {
  MIN_EDGE_MARGIN,
  MIN_CONTENT_WIDTH,
  computeFit,
  resolveDirection,
  computeTooltipOriginUnclamped,
  clampTooltipOriginToViewport,
  placeTooltip,
  contentMaxWidth,
} from './components/TooltipPlacement';
export {
  arrowBoxExtent,
  buildArrowGeometry,
  toSvgPath,
  strokeSegmentsToSvgPath,
} from './components/TooltipArrow';
export {
  TOOLTIP_DEFAULTS,
  resolveTooltipOptions,
  parseTooltipOptionsFromDataset,
  type TooltipOptions,
} from './config/tooltipOptions';
export { TooltipSession } from './session/TooltipSession';
export { SizeProber, OFFSCREEN_ORIGIN } from './session/SizeProber';
export { createDomTooltipHost } from './host/domHost';
export { findScrollableAncestors, canScroll, type ScrollableNode } from './host/scrollableAncestors';
export { isOutsideTap, type ContainerNode } from './host/outsideTap';
export { attachTooltip, type TooltipAttachment } from './attachTooltip';
export type {
  TooltipHost,
  TooltipDrawable,
  PositionedTooltip,
  TooltipAppearance,
  OverlayCallbacks,
  OverlayHandle,
  Unsubscribe,
  CancelScheduled,
} from './host/types';
export * from './types/tooltip';
