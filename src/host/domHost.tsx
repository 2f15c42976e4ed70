// Browser implementation of TooltipHost. Each overlay, and each off-screen
// measurement, gets its own React root in a container appended to <body>.

import type { ReactNode } from 'react';
import { flushSync } from 'react-dom';
import { createRoot, type Root } from 'react-dom/client';
import { TooltipBubble } from '../components/TooltipBubble';
import { findScrollableAncestors } from './scrollableAncestors';
import { isOutsideTap } from './outsideTap';
import type { OverlayHandle, TooltipHost } from './types';

interface MountedOverlay {
  root: Root;
  container: HTMLElement;
  removePointerListener: () => void;
}

let nextOverlayId = 0;

export function createDomTooltipHost(anchor: HTMLElement): TooltipHost<ReactNode, HTMLElement> {
  const doc = anchor.ownerDocument;
  const view = doc.defaultView ?? window;
  const overlays = new Map<number, MountedOverlay>();

  function createContainer(): HTMLDivElement {
    const container = doc.createElement('div');
    container.setAttribute('data-tooltip-root', '');
    doc.body.appendChild(container);
    return container;
  }

  function disposeRoot(root: Root, container: HTMLElement): void {
    root.unmount();
    container.remove();
  }

  return {
    measureOffscreen(drawable, origin) {
      if (!anchor.isConnected) return Promise.resolve(null);

      return new Promise((resolve, reject) => {
        const container = createContainer();
        const root = createRoot(container);
        try {
          flushSync(() => {
            root.render(<TooltipBubble tooltip={drawable} origin={origin} />);
          });
        } catch (e) {
          disposeRoot(root, container);
          reject(e);
          return;
        }

        // Layout is settled by the next frame
        view.requestAnimationFrame(() => {
          const bubble = container.firstElementChild;
          const rect = bubble ? bubble.getBoundingClientRect() : null;
          disposeRoot(root, container);
          resolve(rect ? { width: rect.width, height: rect.height } : null);
        });
      });
    },

    getAnchorGeometry() {
      if (!anchor.isConnected) return null;
      const rect = anchor.getBoundingClientRect();
      return {
        origin: { x: rect.left, y: rect.top },
        extent: { width: rect.width, height: rect.height },
      };
    },

    getViewportExtent() {
      return { width: view.innerWidth, height: view.innerHeight };
    },

    findScrollableAncestors() {
      return findScrollableAncestors<HTMLElement>(anchor, (el) => el.parentElement);
    },

    subscribeScroll(ancestor, onScroll) {
      // The document scroller fires its scroll events on the window
      const target: EventTarget = ancestor === doc.scrollingElement ? view : ancestor;
      target.addEventListener('scroll', onScroll, { passive: true });
      return () => target.removeEventListener('scroll', onScroll);
    },

    mountOverlay(overlay, callbacks): OverlayHandle {
      const id = ++nextOverlayId;
      const container = createContainer();
      const root = createRoot(container);
      let body: HTMLDivElement | null = null;

      flushSync(() => {
        root.render(
          <TooltipBubble
            tooltip={overlay}
            origin={overlay.origin}
            bodyRef={(el) => {
              body = el;
            }}
          />
        );
      });

      const onPointerDown = (event: PointerEvent) => {
        const target = event.target instanceof Node ? event.target : null;
        if (isOutsideTap(target, body, anchor, callbacks.ignoreAnchorTaps)) {
          callbacks.onOutsideTap();
        }
      };
      doc.addEventListener('pointerdown', onPointerDown, true);

      overlays.set(id, {
        root,
        container,
        removePointerListener: () => doc.removeEventListener('pointerdown', onPointerDown, true),
      });
      return { id };
    },

    unmountOverlay(handle) {
      const mounted = overlays.get(handle.id);
      if (!mounted) return;
      overlays.delete(handle.id);
      mounted.removePointerListener();
      disposeRoot(mounted.root, mounted.container);
    },

    schedule(delayMs, callback) {
      const timeoutId = view.setTimeout(callback, delayMs);
      return () => view.clearTimeout(timeoutId);
    },
  };
}
