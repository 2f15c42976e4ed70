// Structural subset of Element, so the walk can run against plain objects
export interface ScrollableNode {
  parentElement: ScrollableNode | null;
  scrollHeight: number;
  clientHeight: number;
  scrollWidth: number;
  clientWidth: number;
}

export function canScroll(node: ScrollableNode): boolean {
  return node.scrollHeight > node.clientHeight || node.scrollWidth > node.clientWidth;
}

/**
 * Every ancestor of `start` (excluding itself) that currently has content to
 * scroll, nearest first. The result is a snapshot.
 */
export function findScrollableAncestors<T extends ScrollableNode>(
  start: T,
  getParent: (node: T) => T | null
): T[] {
  const found: T[] = [];
  let current = getParent(start);
  while (current) {
    if (canScroll(current)) {
      found.push(current);
    }
    current = getParent(current);
  }
  return found;
}
