import type { CSSProperties, ReactNode, Ref } from 'react';
import type { TooltipDrawable } from '../host/types';
import type { ArrowGeometry, Direction, Vector2 } from '../types/tooltip';
import { isVerticalDirection } from '../types/tooltip';
import { strokeSegmentsToSvgPath, toSvgPath } from './TooltipArrow';
import { ErrorBoundary } from './ErrorBoundary';
import { colors, fontSize, tooltipPadding, zIndex } from '../styles/tokens';

// Body comes first for up/left, the arrow first for down/right
const ARROW_LEADS: Record<Direction, boolean> = {
  up: false,
  down: true,
  left: false,
  right: true,
};

// Negative margin on the side facing the body, so the base slides under it
export function arrowOverlapMargin(direction: Direction, overlap: number): CSSProperties {
  if (overlap === 0) return {};
  switch (direction) {
    case 'up':
      return { marginTop: -overlap };
    case 'down':
      return { marginBottom: -overlap };
    case 'left':
      return { marginLeft: -overlap };
    case 'right':
      return { marginRight: -overlap };
  }
}

interface TooltipArrowShapeProps {
  arrow: ArrowGeometry;
  fillColor: string;
  strokeColor: string | null;
}

export function TooltipArrowShape({ arrow, fillColor, strokeColor }: TooltipArrowShapeProps) {
  const { width, height } = arrow.boxExtent;
  const showStroke = strokeColor !== null && arrow.strokeSegments.length > 0;

  return (
    <svg
      width={width}
      height={height}
      viewBox={`0 0 ${width} ${height}`}
      aria-hidden="true"
      style={{
        display: 'block',
        flexShrink: 0,
        overflow: 'visible',
        position: 'relative',
        // Paint over the body so its border doesn't cut across the arrow base
        zIndex: 1,
        ...arrowOverlapMargin(arrow.direction, arrow.overlap),
      }}
    >
      <path d={toSvgPath(arrow.fill, true)} fill={fillColor} />
      {showStroke && (
        <path
          d={strokeSegmentsToSvgPath(arrow.strokeSegments)}
          fill="none"
          stroke={strokeColor ?? undefined}
          strokeWidth={arrow.strokeWidth}
          strokeLinecap="round"
        />
      )}
    </svg>
  );
}

interface TooltipBubbleProps {
  tooltip: TooltipDrawable<ReactNode>;
  /** Fixed screen position; omitted when the caller positions the container */
  origin?: Vector2;
  bodyRef?: Ref<HTMLDivElement>;
}

export function TooltipBubble({ tooltip, origin, bodyRef }: TooltipBubbleProps) {
  const { direction, appearance, arrow } = tooltip;
  const hasBorder = appearance.borderColor !== null && appearance.borderWidth > 0;

  const body = (
    <div
      ref={bodyRef}
      role="tooltip"
      data-tooltip-body=""
      style={{
        boxSizing: 'border-box',
        maxWidth: tooltip.maxWidth,
        padding: `${tooltipPadding.vertical}px ${tooltipPadding.horizontal}px`,
        backgroundColor: appearance.backgroundColor,
        borderRadius: appearance.cornerRadius,
        border: hasBorder ? `${appearance.borderWidth}px solid ${appearance.borderColor}` : undefined,
        color: colors.tooltip.text,
        fontSize: fontSize.sm,
        lineHeight: 1.4,
        whiteSpace: 'normal',
        wordWrap: 'break-word',
      }}
    >
      <ErrorBoundary name="Tooltip">{tooltip.content}</ErrorBoundary>
    </div>
  );

  const arrowShape = (
    <TooltipArrowShape
      arrow={arrow}
      fillColor={appearance.backgroundColor}
      strokeColor={hasBorder ? appearance.borderColor : null}
    />
  );

  return (
    <div
      data-tooltip-direction={direction}
      style={{
        position: 'fixed',
        left: origin?.x ?? 0,
        top: origin?.y ?? 0,
        zIndex: zIndex.tooltip,
        display: 'flex',
        flexDirection: isVerticalDirection(direction) ? 'column' : 'row',
        alignItems: 'center',
        width: 'max-content',
      }}
    >
      {ARROW_LEADS[direction] ? arrowShape : body}
      {ARROW_LEADS[direction] ? body : arrowShape}
    </div>
  );
}

export default TooltipBubble;
