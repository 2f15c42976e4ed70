// Structural subset of Node, so the check can run against plain objects
export interface ContainerNode<T> {
  contains(other: T | null): boolean;
}

/**
 * Whether a pointerdown on `target` should dismiss the tooltip. Taps inside
 * the body never do; taps on the anchor do unless the anchor toggles itself.
 */
export function isOutsideTap<T>(
  target: T | null,
  body: ContainerNode<T> | null,
  anchor: ContainerNode<T>,
  ignoreAnchorTaps: boolean
): boolean {
  if (target === null) return true;
  if (body?.contains(target)) return false;
  if (ignoreAnchorTaps && anchor.contains(target)) return false;
  return true;
}
