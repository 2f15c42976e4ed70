import { forwardRef, useEffect, useImperativeHandle, useMemo, useRef, ReactNode } from 'react';
import { resolveTooltipOptions, type TooltipOptions } from '../config/tooltipOptions';
import { createDomTooltipHost } from '../host/domHost';
import { TooltipSession } from '../session/TooltipSession';

export interface TooltipHandle {
  show: () => void;
  hide: () => void;
}

export interface TooltipProps extends Partial<TooltipOptions> {
  content: ReactNode;
  children: ReactNode;
  /** Disabled state - tooltip won't show, and an open one closes */
  disabled?: boolean;
}

/**
 * Tap-to-show tooltip anchored to its children.
 *
 * Usage:
 *   <Tooltip content="Helpful text" preferredDirection="right">
 *     <button>Tap me</button>
 *   </Tooltip>
 *
 * With `showOnTap={false}` the tooltip is driven through the ref handle only.
 */
export const Tooltip = forwardRef<TooltipHandle, TooltipProps>(function Tooltip(
  { content, children, disabled = false, ...optionProps },
  ref
) {
  const triggerRef = useRef<HTMLSpanElement>(null);
  const sessionRef = useRef<TooltipSession<ReactNode, HTMLElement> | null>(null);

  // Option objects are rebuilt every render; key on their content instead
  const optionsKey = JSON.stringify(optionProps);
  const options = useMemo(() => resolveTooltipOptions(optionProps), [optionsKey]);

  useEffect(() => {
    const trigger = triggerRef.current;
    if (!trigger) return;
    const session = new TooltipSession(createDomTooltipHost(trigger), content, options);
    sessionRef.current = session;
    return () => {
      session.dispose();
      sessionRef.current = null;
    };
  }, []);

  useEffect(() => {
    sessionRef.current?.setContent(content);
  }, [content]);

  useEffect(() => {
    sessionRef.current?.setOptions(options);
  }, [options]);

  useEffect(() => {
    if (disabled) sessionRef.current?.hide();
  }, [disabled]);

  useImperativeHandle(
    ref,
    () => ({
      show: () => {
        if (!disabled) sessionRef.current?.show();
      },
      hide: () => sessionRef.current?.hide(),
    }),
    [disabled]
  );

  const handleClick = () => {
    if (disabled || !options.showOnTap) return;
    sessionRef.current?.toggle();
  };

  return (
    <span
      ref={triggerRef}
      data-tooltip-trigger=""
      onClick={handleClick}
      style={{ display: 'inline-block', cursor: options.showOnTap && !disabled ? 'pointer' : undefined }}
    >
      {children}
    </span>
  );
});

export default Tooltip;
