// Measures a tooltip's natural size by rendering it far off screen.
// Off-viewport rather than transparent, so the size is never clipped.

import type { TooltipDrawable, TooltipHost } from '../host/types';
import type { Extent, Vector2 } from '../types/tooltip';
import { OFFSCREEN_COORDINATE } from '../styles/tokens';

export const OFFSCREEN_ORIGIN: Vector2 = { x: OFFSCREEN_COORDINATE, y: OFFSCREEN_COORDINATE };

function isUsableExtent(extent: Extent): boolean {
  return (
    Number.isFinite(extent.width) &&
    Number.isFinite(extent.height) &&
    extent.width >= 0 &&
    extent.height >= 0
  );
}

export class SizeProber<TContent> {
  private host: Pick<TooltipHost<TContent>, 'measureOffscreen'>;

  constructor(host: Pick<TooltipHost<TContent>, 'measureOffscreen'>) {
    this.host = host;
  }

  /**
   * Resolves with the measured size, or null when the host can't render
   * (anchor detached) or misbehaves. Never rejects.
   */
  async measure(drawable: TooltipDrawable<TContent>): Promise<Extent | null> {
    let extent: Extent | null;
    try {
      extent = await this.host.measureOffscreen(drawable, OFFSCREEN_ORIGIN);
    } catch (e) {
      console.warn('[SizeProber] Off-screen measurement failed:', e);
      return null;
    }

    if (extent === null) return null;
    if (!isUsableExtent(extent)) {
      console.warn(`[SizeProber] Ignoring unusable size ${extent.width}x${extent.height}`);
      return null;
    }
    return { width: extent.width, height: extent.height };
  }
}
