// src/geometry/point-order.ts

import type { Circle } from "../types/drawing";

/**
 * Order circles by X, then Y, then diameter.
 */
export function compareXThenY(a: Circle, b: Circle): number {
  const ax = a.x ?? 0;
  const bx = b.x ?? 0;
  if (ax !== bx) return ax < bx ? -1 : 1;

  const ay = a.y ?? 0;
  const by = b.y ?? 0;
  if (ay !== by) return ay < by ? -1 : 1;

  return (a.diameter ?? 0) - (b.diameter ?? 0);
}

/**
 * Sort circles by position and drop any circle sitting at the same (X, Y)
 * as the one kept before it. Diameter does not take part in the
 * duplicate check: stacked circles of different sizes collapse to the smallest.
 */
export function sortedUniquePoints(circles: readonly Circle[]): Circle[] {
  const sorted = [...circles].sort(compareXThenY);
  const result: Circle[] = [];

  for (const c of sorted) {
    const last = result[result.length - 1];
    if (last && (last.x ?? 0) === (c.x ?? 0) && (last.y ?? 0) === (c.y ?? 0)) {
      continue;
    }
    result.push(c);
  }

  return result;
}

export function isAtOrigin(c: Circle): boolean {
  return (c.x ?? 0) === 0 && (c.y ?? 0) === 0;
}
