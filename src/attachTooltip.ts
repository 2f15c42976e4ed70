import type { ReactNode } from 'react';
import {
  parseTooltipOptionsFromDataset,
  resolveTooltipOptions,
  type TooltipOptions,
} from './config/tooltipOptions';
import { createDomTooltipHost } from './host/domHost';
import { TooltipSession } from './session/TooltipSession';

export interface TooltipAttachment {
  show: () => void;
  hide: () => void;
  /** Remove the click listener and tear down any open tooltip */
  detach: () => void;
}

/**
 * Attach a tooltip to an existing element without a React tree around it.
 * `data-tooltip-*` attributes on the element supply options; explicit
 * `options` win over them.
 */
export function attachTooltip(
  element: HTMLElement,
  content: ReactNode,
  options: Partial<TooltipOptions> = {}
): TooltipAttachment {
  const resolved = resolveTooltipOptions({
    ...parseTooltipOptionsFromDataset(element.dataset),
    ...options,
  });
  const session = new TooltipSession(createDomTooltipHost(element), content, resolved);

  const onClick = () => session.toggle();
  if (resolved.showOnTap) {
    element.addEventListener('click', onClick);
  }

  return {
    show: () => session.show(),
    hide: () => session.hide(),
    detach: () => {
      element.removeEventListener('click', onClick);
      session.dispose();
    },
  };
}
