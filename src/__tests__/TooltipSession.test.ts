// Tests for the tooltip session lifecycle, run against an in-memory host
// Run with: npx tsx src/__tests__/TooltipSession.test.ts

import { TooltipSession } from '../session/TooltipSession';
import { TOOLTIP_DEFAULTS, type TooltipOptions } from '../config/tooltipOptions';
import type {
  CancelScheduled,
  OverlayCallbacks,
  OverlayHandle,
  PositionedTooltip,
  TooltipDrawable,
  TooltipHost,
  Unsubscribe,
} from '../host/types';
import type { AnchorGeometry, Extent, Vector2 } from '../types/tooltip';
import { isOutsideTap, type ContainerNode } from '../host/outsideTap';

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    console.log(`  ✓ ${name}`);
    passed++;
  } catch (e) {
    console.log(`  ✗ ${name}`);
    console.log(`    Error: ${e}`);
    failed++;
  }
}

function assertEqual<T>(actual: T, expected: T, message?: string): void {
  const actualStr = JSON.stringify(actual);
  const expectedStr = JSON.stringify(expected);
  if (actualStr !== expectedStr) {
    throw new Error(`${message || 'Assertion failed'}: expected ${expectedStr}, got ${actualStr}`);
  }
}

function assertTrue(condition: boolean, message?: string): void {
  if (!condition) {
    throw new Error(message || 'Expected true but got false');
  }
}

// Let pending measurement promises settle
function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

interface ScheduledTimer {
  delay: number;
  callback: () => void;
  cancelled: boolean;
}

interface MountedOverlay {
  overlay: PositionedTooltip<string>;
  callbacks: OverlayCallbacks;
}

class FakeHost implements TooltipHost<string, string> {
  anchor: AnchorGeometry | null = { origin: { x: 100, y: 300 }, extent: { width: 40, height: 20 } };
  viewport: Extent = { width: 400, height: 600 };
  contentExtent: Extent | null = { width: 120, height: 50 };
  /** When set, measurements stay pending until resolveMeasure() */
  deferMeasure = false;
  mountError: Error | null = null;
  ancestors: string[] = [];

  measureCalls: { drawable: TooltipDrawable<string>; origin: Vector2 }[] = [];
  pendingMeasures: ((extent: Extent | null) => void)[] = [];
  mounted = new Map<number, MountedOverlay>();
  mountCount = 0;
  unmountCount = 0;
  scrollListeners = new Map<string, Set<() => void>>();
  subscribedAncestors: string[] = [];
  timers: ScheduledTimer[] = [];
  private nextId = 1;

  measureOffscreen(drawable: TooltipDrawable<string>, origin: Vector2): Promise<Extent | null> {
    this.measureCalls.push({ drawable, origin });
    if (this.deferMeasure) {
      return new Promise((resolve) => this.pendingMeasures.push(resolve));
    }
    return Promise.resolve(this.contentExtent);
  }

  resolveMeasure(index: number, extent: Extent | null): void {
    this.pendingMeasures[index](extent);
  }

  getAnchorGeometry(): AnchorGeometry | null {
    return this.anchor;
  }

  getViewportExtent(): Extent {
    return this.viewport;
  }

  findScrollableAncestors(): string[] {
    return [...this.ancestors];
  }

  subscribeScroll(ancestor: string, onScroll: () => void): Unsubscribe {
    this.subscribedAncestors.push(ancestor);
    let listeners = this.scrollListeners.get(ancestor);
    if (!listeners) {
      listeners = new Set<() => void>();
      this.scrollListeners.set(ancestor, listeners);
    }
    const set = listeners;
    set.add(onScroll);
    return () => {
      set.delete(onScroll);
    };
  }

  fireScroll(ancestor: string): void {
    for (const listener of [...(this.scrollListeners.get(ancestor) ?? [])]) {
      listener();
    }
  }

  listenerCount(): number {
    let count = 0;
    for (const listeners of this.scrollListeners.values()) {
      count += listeners.size;
    }
    return count;
  }

  mountOverlay(overlay: PositionedTooltip<string>, callbacks: OverlayCallbacks): OverlayHandle {
    if (this.mountError) throw this.mountError;
    const id = this.nextId++;
    this.mounted.set(id, { overlay, callbacks });
    this.mountCount++;
    return { id };
  }

  unmountOverlay(handle: OverlayHandle): void {
    this.mounted.delete(handle.id);
    this.unmountCount++;
  }

  schedule(delay: number, callback: () => void): CancelScheduled {
    const timer: ScheduledTimer = { delay, callback, cancelled: false };
    this.timers.push(timer);
    return () => {
      timer.cancelled = true;
    };
  }

  // Pointer down on a named target: 'body', 'anchor' or anything else
  tap(target: string): void {
    const anchorNode: ContainerNode<string> = { contains: (other) => other === 'anchor' };
    for (const { callbacks } of [...this.mounted.values()]) {
      const bodyNode: ContainerNode<string> = { contains: (other) => other === 'body' };
      if (isOutsideTap(target, bodyNode, anchorNode, callbacks.ignoreAnchorTaps)) {
        callbacks.onOutsideTap();
      }
    }
  }

  onlyOverlay(): MountedOverlay {
    const overlays = [...this.mounted.values()];
    if (overlays.length !== 1) {
      throw new Error(`expected one mounted overlay, found ${overlays.length}`);
    }
    return overlays[0];
  }
}

function createSession(
  host: FakeHost,
  overrides: Partial<TooltipOptions> = {}
): TooltipSession<string, string> {
  return new TooltipSession(host, 'hello', { ...TOOLTIP_DEFAULTS, ...overrides });
}

async function showAndSettle(session: TooltipSession<string, string>): Promise<void> {
  session.show();
  await flush();
}

async function run(): Promise<void> {
  // Session debug logging is noise here
  console.debug = () => {};

  console.log('\nTooltipSession Tests\n');

  console.log('Show:');

  await test('idle -> measuring -> visible', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    assertEqual(session.getState(), 'idle');
    session.show();
    assertEqual(session.getState(), 'measuring');
    await flush();
    assertEqual(session.getState(), 'visible');
    assertEqual(host.mountCount, 1);
  });

  await test('measures at the off-screen origin with the preferred direction', async () => {
    const host = new FakeHost();
    await showAndSettle(createSession(host));
    assertEqual(host.measureCalls.length, 1);
    assertEqual(host.measureCalls[0].origin, { x: -9999, y: -9999 });
    assertEqual(host.measureCalls[0].drawable.direction, 'up');
    assertEqual(host.measureCalls[0].drawable.content, 'hello');
  });

  await test('places above the anchor when there is room', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    await showAndSettle(session);
    assertEqual(session.getPlacement(), { finalOrigin: { x: 60, y: 250 }, actualDirection: 'up' });
    const { overlay } = host.onlyOverlay();
    assertEqual(overlay.origin, { x: 60, y: 250 });
    assertEqual(overlay.extent, { width: 120, height: 50 });
    assertEqual(overlay.direction, 'up');
  });

  await test('flips below an anchor near the top', async () => {
    const host = new FakeHost();
    host.anchor = { origin: { x: 100, y: 20 }, extent: { width: 40, height: 20 } };
    const session = createSession(host);
    await showAndSettle(session);
    assertEqual(session.getPlacement(), { finalOrigin: { x: 60, y: 40 }, actualDirection: 'down' });
    assertEqual(host.onlyOverlay().overlay.arrow.direction, 'down');
  });

  await test('repeated show mounts a single overlay', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    session.show();
    session.show();
    await flush();
    session.show();
    await flush();
    assertEqual(host.measureCalls.length, 1);
    assertEqual(host.mountCount, 1);
    assertEqual(session.getState(), 'visible');
  });

  await test('missing anchor geometry keeps the session idle', async () => {
    const host = new FakeHost();
    host.anchor = null;
    const session = createSession(host);
    session.show();
    assertEqual(session.getState(), 'idle');
    await flush();
    assertEqual(host.measureCalls.length, 0);
    assertEqual(host.mountCount, 0);
  });

  await test('unmeasurable content returns to idle', async () => {
    const host = new FakeHost();
    host.contentExtent = null;
    const session = createSession(host);
    await showAndSettle(session);
    assertEqual(session.getState(), 'idle');
    assertEqual(host.mountCount, 0);
  });

  console.log('\nDrawable:');

  await test('vertical tooltips are limited to the viewport minus edge margins', async () => {
    const host = new FakeHost();
    await showAndSettle(createSession(host));
    assertEqual(host.measureCalls[0].drawable.maxWidth, 368);
  });

  await test('side tooltips measure with half the viewport and mount in the flipped direction', async () => {
    const host = new FakeHost();
    const session = createSession(host, { preferredDirection: 'left' });
    await showAndSettle(session);
    assertEqual(host.measureCalls[0].drawable.direction, 'left');
    assertEqual(host.measureCalls[0].drawable.maxWidth, 200);
    const { overlay } = host.onlyOverlay();
    assertEqual(overlay.direction, 'right');
    assertEqual(overlay.origin, { x: 140, y: 285 });
  });

  await test('a border strokes the arrow edges', async () => {
    const host = new FakeHost();
    await showAndSettle(createSession(host, { borderColor: '#ffffff', borderWidth: 2 }));
    const { overlay } = host.onlyOverlay();
    assertEqual(overlay.arrow.strokeSegments.length, 2);
    assertEqual(overlay.arrow.strokeWidth, 2);
    assertEqual(overlay.appearance.borderColor, '#ffffff');
  });

  await test('a border wider than the overlap widens the arrow base under it', async () => {
    const host = new FakeHost();
    await showAndSettle(createSession(host, { borderColor: '#ffffff', borderWidth: 2 }));
    const { arrow } = host.onlyOverlay().overlay;
    assertEqual(arrow.overlap, 2);
    assertEqual(arrow.boxExtent, { width: 16, height: 10 });
    assertEqual(arrow.fill, [
      { x: 0, y: 0 },
      { x: 0, y: 2 },
      { x: 8, y: 10 },
      { x: 16, y: 2 },
      { x: 16, y: 0 },
    ]);
  });

  await test('overlap larger than the border is kept', async () => {
    const host = new FakeHost();
    await showAndSettle(createSession(host, { borderColor: '#ffffff', borderWidth: 2, arrowOverlap: 3 }));
    assertEqual(host.onlyOverlay().overlay.arrow.overlap, 3);
  });

  await test('without a border the configured overlap is used', async () => {
    const host = new FakeHost();
    await showAndSettle(createSession(host, { borderWidth: 2 }));
    assertEqual(host.onlyOverlay().overlay.arrow.overlap, 1);
  });

  await test('border width without a color draws no stroke', async () => {
    const host = new FakeHost();
    await showAndSettle(createSession(host, { borderWidth: 2 }));
    assertEqual(host.onlyOverlay().overlay.arrow.strokeSegments, []);
  });

  await test('setContent applies on the next show', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    session.setContent('updated');
    await showAndSettle(session);
    assertEqual(host.onlyOverlay().overlay.content, 'updated');
  });

  await test('setOptions applies on the next show', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    session.setOptions({ ...TOOLTIP_DEFAULTS, preferredDirection: 'down' });
    await showAndSettle(session);
    assertEqual(session.getPlacement()?.actualDirection, 'down');
  });

  console.log('\nHide:');

  await test('hide unmounts and returns to idle', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    await showAndSettle(session);
    session.hide();
    assertEqual(session.getState(), 'idle');
    assertEqual(host.mounted.size, 0);
    assertEqual(host.unmountCount, 1);
    assertEqual(session.getPlacement(), null);
  });

  await test('hide is idempotent', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    session.hide();
    await showAndSettle(session);
    session.hide();
    session.hide();
    assertEqual(host.unmountCount, 1);
  });

  await test('toggle shows then hides', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    session.toggle();
    await flush();
    assertEqual(session.getState(), 'visible');
    session.toggle();
    assertEqual(session.getState(), 'idle');
  });

  await test('outside tap hides', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    await showAndSettle(session);
    host.onlyOverlay().callbacks.onOutsideTap();
    assertEqual(session.getState(), 'idle');
    assertEqual(host.mounted.size, 0);
  });

  await test('tap inside the body keeps the tooltip open', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    await showAndSettle(session);
    host.tap('body');
    assertEqual(session.getState(), 'visible');
  });

  await test('anchor taps are left to the toggling trigger', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    await showAndSettle(session);
    assertEqual(host.onlyOverlay().callbacks.ignoreAnchorTaps, true);
    host.tap('anchor');
    assertEqual(session.getState(), 'visible');
  });

  await test('anchor tap hides when the anchor does not toggle', async () => {
    const host = new FakeHost();
    const session = createSession(host, { showOnTap: false });
    await showAndSettle(session);
    assertEqual(host.onlyOverlay().callbacks.ignoreAnchorTaps, false);
    host.tap('anchor');
    assertEqual(session.getState(), 'idle');
    assertEqual(host.mounted.size, 0);
  });

  await test('tap elsewhere hides', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    await showAndSettle(session);
    host.tap('page');
    assertEqual(session.getState(), 'idle');
  });

  await test('session can be shown again after hiding', async () => {
    const host = new FakeHost();
    const session = createSession(host);
    await showAndSettle(session);
    session.hide();
    await showAndSettle(session);
    assertEqual(session.getState(), 'visible');
    assertEqual(host.mountCount, 2);
    assertEqual(host.mounted.size, 1);
  });

  console.log('\nScroll:');

  await test('subscribes to every scrollable ancestor once visible', async () => {
    const host = new FakeHost();
    host.ancestors = ['list', 'page'];
    const session = createSession(host);
    session.show();
    assertEqual(host.subscribedAncestors, [], 'no subscriptions while measuring');
    await flush();
    assertEqual(host.subscribedAncestors, ['list', 'page']);
  });

  await test('scrolling any ancestor hides and unsubscribes', async () => {
    const host = new FakeHost();
    host.ancestors = ['list', 'page'];
    const session = createSession(host);
    await showAndSettle(session);
    host.fireScroll('page');
    assertEqual(session.getState(), 'idle');
    assertEqual(host.mounted.size, 0);
    assertEqual(host.listenerCount(), 0);
  });

  await test('ancestors that become scrollable later are not tracked', async () => {
    const host = new FakeHost();
    host.ancestors = ['list'];
    const session = createSession(host);
    await showAndSettle(session);
    host.ancestors = ['list', 'late'];
    host.fireScroll('late');
    assertEqual(session.getState(), 'visible');
    assertEqual(host.subscribedAncestors, ['list']);
  });

  console.log('\nAuto-hide:');

  await test('no timer without a duration', async () => {
    const host = new FakeHost();
    await showAndSettle(createSession(host));
    assertEqual(host.timers.length, 0);
  });

  await test('timer fires hide after the duration', async () => {
    const host = new FakeHost();
    const session = createSession(host, { autoHideDuration: 1500 });
    await showAndSettle(session);
    assertEqual(host.timers.length, 1);
    assertEqual(host.timers[0].delay, 1500);
    host.timers[0].callback();
    assertEqual(session.getState(), 'idle');
    assertEqual(host.mounted.size, 0);
  });

  await test('manual hide cancels the timer', async () => {
    const host = new FakeHost();
    const session = createSession(host, { autoHideDuration: 1500 });
    await showAndSettle(session);
    session.hide();
    assertTrue(host.timers[0].cancelled, 'timer cancelled');
  });

  await test('a timer from an earlier showing does not hide the current one', async () => {
    const host = new FakeHost();
    const session = createSession(host, { autoHideDuration: 1500 });
    await showAndSettle(session);
    session.hide();
    await showAndSettle(session);
    host.timers[0].callback();
    assertEqual(session.getState(), 'visible');
    assertEqual(host.timers.length, 2);
  });

  console.log('\nStale measurements:');

  await test('measurement completing after hide is discarded', async () => {
    const host = new FakeHost();
    host.deferMeasure = true;
    const session = createSession(host);
    session.show();
    session.hide();
    assertEqual(session.getState(), 'idle');
    host.resolveMeasure(0, { width: 120, height: 50 });
    await flush();
    assertEqual(session.getState(), 'idle');
    assertEqual(host.mountCount, 0);
  });

  await test('only the latest measurement mounts', async () => {
    const host = new FakeHost();
    host.deferMeasure = true;
    const session = createSession(host);
    session.show();
    session.hide();
    session.show();
    host.resolveMeasure(0, { width: 120, height: 50 });
    await flush();
    assertEqual(session.getState(), 'measuring');
    assertEqual(host.mountCount, 0);
    host.resolveMeasure(1, { width: 120, height: 50 });
    await flush();
    assertEqual(session.getState(), 'visible');
    assertEqual(host.mountCount, 1);
  });

  await test('measurement completing after dispose is discarded', async () => {
    const host = new FakeHost();
    host.deferMeasure = true;
    const session = createSession(host);
    session.show();
    session.dispose();
    host.resolveMeasure(0, { width: 120, height: 50 });
    await flush();
    assertEqual(host.mountCount, 0);
    assertTrue(session.isDisposed());
  });

  console.log('\nDispose:');

  await test('dispose hides and blocks later shows', async () => {
    const host = new FakeHost();
    host.ancestors = ['list'];
    const session = createSession(host, { autoHideDuration: 1000 });
    await showAndSettle(session);
    session.dispose();
    assertEqual(session.getState(), 'idle');
    assertEqual(host.mounted.size, 0);
    assertEqual(host.listenerCount(), 0);
    assertTrue(host.timers[0].cancelled, 'timer cancelled');
    session.show();
    await flush();
    assertEqual(host.measureCalls.length, 1);
    assertEqual(session.getState(), 'idle');
  });

  console.log('\nHost failures:');

  await test('a failing mount is logged and leaves the session idle', async () => {
    const host = new FakeHost();
    host.mountError = new Error('overlay layer missing');
    const session = createSession(host);
    const errors: unknown[][] = [];
    const originalError = console.error;
    console.error = (...args: unknown[]) => {
      errors.push(args);
    };
    try {
      await showAndSettle(session);
    } finally {
      console.error = originalError;
    }
    assertEqual(session.getState(), 'idle');
    assertEqual(errors.length, 1);
    assertEqual(errors[0][0], '[TooltipSession] Failed to show tooltip:');
    assertTrue(errors[0][1] === host.mountError, 'original error is logged');
  });

  console.log('\n--------------------------');
  console.log(`Tests: ${passed} passed, ${failed} failed`);
  console.log('--------------------------\n');

  if (failed > 0) {
    process.exit(1);
  }
}

run().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
