// Owns at most one tooltip overlay for a single trigger.
//
//   idle --show()--> measuring --size--> visible --hide()--> idle
//
// Measurement and the auto-hide timer are the only async gaps. Both carry the
// generation they were started in; hide() bumps it so late callbacks from a
// torn-down cycle are dropped instead of reviving the session.

import type {
  CancelScheduled,
  OverlayHandle,
  TooltipDrawable,
  TooltipHost,
  Unsubscribe,
} from '../host/types';
import type {
  AnchorGeometry,
  Direction,
  Extent,
  PlacementResult,
  TooltipSessionState,
} from '../types/tooltip';
import { TOOLTIP_DEFAULTS, type TooltipOptions } from '../config/tooltipOptions';
import { contentMaxWidth, placeTooltip } from '../components/TooltipPlacement';
import { arrowBoxExtent, buildArrowGeometry } from '../components/TooltipArrow';
import { SizeProber } from './SizeProber';

export class TooltipSession<TContent, TAncestor = unknown> {
  private host: TooltipHost<TContent, TAncestor>;
  private prober: SizeProber<TContent>;
  private content: TContent;
  private options: TooltipOptions;

  private state: TooltipSessionState = 'idle';
  private generation = 0;
  private disposed = false;
  private overlay: OverlayHandle | null = null;
  private cancelAutoHide: CancelScheduled | null = null;
  private scrollSubscriptions: Unsubscribe[] = [];
  private placement: PlacementResult | null = null;

  constructor(
    host: TooltipHost<TContent, TAncestor>,
    content: TContent,
    options: TooltipOptions = TOOLTIP_DEFAULTS
  ) {
    this.host = host;
    this.prober = new SizeProber(host);
    this.content = content;
    this.options = options;
  }

  getState(): TooltipSessionState {
    return this.state;
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  /** Placement of the visible overlay, null unless visible */
  getPlacement(): PlacementResult | null {
    return this.state === 'visible' ? this.placement : null;
  }

  // Content and options apply from the next show()
  setContent(content: TContent): void {
    this.content = content;
  }

  setOptions(options: TooltipOptions): void {
    this.options = options;
  }

  show(): void {
    // One overlay per session: ignore while measuring or visible
    if (this.disposed || this.state !== 'idle') return;

    const anchor = this.host.getAnchorGeometry();
    if (!anchor) {
      console.debug('[TooltipSession] Anchor geometry unavailable, not showing');
      return;
    }

    this.state = 'measuring';
    const generation = ++this.generation;
    const viewport = this.host.getViewportExtent();
    const drawable = this.buildDrawable(this.options.preferredDirection, viewport.width);

    this.prober
      .measure(drawable)
      .then((extent) => this.handleMeasured(generation, anchor, extent))
      .catch((e: unknown) => {
        console.error('[TooltipSession] Failed to show tooltip:', e);
        if (generation === this.generation) this.hide();
      });
  }

  /** Safe to call in any state */
  hide(): void {
    if (this.state === 'idle') return;
    this.generation++;
    this.teardown();
    this.state = 'idle';
  }

  toggle(): void {
    if (this.state === 'idle') {
      this.show();
    } else {
      this.hide();
    }
  }

  dispose(): void {
    this.hide();
    this.disposed = true;
  }

  private handleMeasured(generation: number, anchor: AnchorGeometry, extent: Extent | null): void {
    if (generation !== this.generation || this.state !== 'measuring') {
      console.debug('[TooltipSession] Discarding stale measurement');
      return;
    }
    if (!extent) {
      this.state = 'idle';
      return;
    }

    const viewport = this.host.getViewportExtent();
    const placement = placeTooltip({
      viewport,
      anchorOrigin: anchor.origin,
      anchorExtent: anchor.extent,
      contentExtent: extent,
      preferredDirection: this.options.preferredDirection,
      margin: this.options.margin,
    });
    const drawable = this.buildDrawable(placement.actualDirection, viewport.width);

    this.overlay = this.host.mountOverlay(
      { ...drawable, origin: placement.finalOrigin, extent },
      { onOutsideTap: () => this.hide(), ignoreAnchorTaps: this.options.showOnTap }
    );
    this.placement = placement;
    this.state = 'visible';

    const { autoHideDuration } = this.options;
    if (autoHideDuration !== null) {
      this.cancelAutoHide = this.host.schedule(autoHideDuration, () => {
        if (generation === this.generation) this.hide();
      });
    }

    // Snapshot: containers that become scrollable later are not tracked
    for (const ancestor of this.host.findScrollableAncestors()) {
      this.scrollSubscriptions.push(
        this.host.subscribeScroll(ancestor, () => this.handleScroll(generation))
      );
    }
  }

  private handleScroll(generation: number): void {
    if (generation !== this.generation || this.state !== 'visible') return;
    console.debug('[TooltipSession] Scroll detected, hiding tooltip');
    this.hide();
  }

  private teardown(): void {
    if (this.cancelAutoHide) {
      this.cancelAutoHide();
      this.cancelAutoHide = null;
    }
    const subscriptions = this.scrollSubscriptions;
    this.scrollSubscriptions = [];
    for (const unsubscribe of subscriptions) {
      unsubscribe();
    }
    if (this.overlay) {
      const overlay = this.overlay;
      this.overlay = null;
      this.host.unmountOverlay(overlay);
    }
    this.placement = null;
  }

  private buildDrawable(direction: Direction, viewportWidth: number): TooltipDrawable<TContent> {
    const o = this.options;
    const hasStroke = o.borderColor !== null && o.borderWidth > 0;
    // The base must cover the body's border to blend into it
    const overlap = hasStroke ? Math.max(o.arrowOverlap, o.borderWidth) : o.arrowOverlap;
    const boxExtent = arrowBoxExtent(direction, o.arrowWidth, o.arrowHeight, overlap);
    return {
      content: this.content,
      direction,
      maxWidth: contentMaxWidth(direction, viewportWidth, o),
      arrow: buildArrowGeometry({
        direction,
        boxExtent,
        overlap,
        strokeWidth: o.borderWidth,
        hasStroke,
      }),
      appearance: {
        backgroundColor: o.backgroundColor,
        cornerRadius: o.cornerRadius,
        borderColor: o.borderColor,
        borderWidth: o.borderWidth,
      },
    };
  }
}
