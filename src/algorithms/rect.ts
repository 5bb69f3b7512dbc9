import { type Rect } from '../types/rect.js';

/**
 * Returns the zero-sized Rect used as the "no placement" sentinel.
 */
export function emptyRect(): Rect {
  return { x: 0, y: 0, width: 0, height: 0 };
}

/**
 * True when `r` is the packer's failure sentinel.
 */
export function isNullRect(r: Rect): boolean {
  return r.height === 0;
}

/**
 * Lexicographic compare on (short side, long side), ascending.
 */
export function compareByShortSide(a: Rect, b: Rect): number {
  const shortA = Math.min(a.width, a.height);
  const shortB = Math.min(b.width, b.height);
  if (shortA !== shortB) return shortA - shortB;

  const longA = Math.max(a.width, a.height);
  const longB = Math.max(b.width, b.height);
  return longA - longB;
}

/**
 * Lexicographic compare on (x, y, width, height), ascending.
 */
export function compareByPosition(a: Rect, b: Rect): number {
  if (a.x !== b.x) return a.x - b.x;
  if (a.y !== b.y) return a.y - b.y;
  if (a.width !== b.width) return a.width - b.width;
  return a.height - b.height;
}

/**
 * True when `a` lies entirely inside `b` (edges may coincide).
 */
export function isContainedIn(a: Rect, b: Rect): boolean {
  return (
    a.x >= b.x &&
    a.y >= b.y &&
    a.x + a.width <= b.x + b.width &&
    a.y + a.height <= b.y + b.height
  );
}

/**
 * True when `a` and `b` share no interior area. Touching edges are disjoint.
 */
export function isDisjoint(a: Rect, b: Rect): boolean {
  return (
    a.x + a.width <= b.x ||
    b.x + b.width <= a.x ||
    a.y + a.height <= b.y ||
    b.y + b.height <= a.y
  );
}

function isDegenerate(r: Rect): boolean {
  return r.width === 0 || r.height === 0;
}

/**
 * A set of rectangles that are pairwise non-overlapping.
 * Used to verify packing results; not part of the placement hot path.
 */
export class DisjointRectCollection {
  private _rects: Rect[] = [];

  get rects(): readonly Rect[] {
    return this._rects;
  }

  /**
   * Adds `r` if it overlaps no member. Returns false (and leaves the
   * collection unchanged) otherwise. Degenerate rects are accepted as no-ops.
   */
  add(r: Rect): boolean {
    if (isDegenerate(r)) return true;
    if (!this.disjoint(r)) return false;

    this._rects.push({ ...r });
    return true;
  }

  clear(): void {
    this._rects = [];
  }

  /**
   * True when `r` overlaps no member of the collection.
   */
  disjoint(r: Rect): boolean {
    if (isDegenerate(r)) return true;
    return this._rects.every((member) => isDisjoint(member, r));
  }
}
