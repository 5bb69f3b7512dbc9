import { type Rect } from '../types/rect.js';
import { type FreeRectChoiceHeuristic } from '../types/heuristic.js';
import { emptyRect, isContainedIn, isNullRect } from './rect.js';

/**
 * A candidate placement and its two-part score. Lower scores are better;
 * `primary` is compared first and `secondary` breaks ties.
 */
export interface ScoredPlacement {
  node: Rect;
  primary: number;
  secondary: number;
}

const WORST_SCORE = Number.MAX_SAFE_INTEGER;

/**
 * Length of the overlap of the 1-D intervals [aStart, aEnd] and [bStart, bEnd].
 */
export function commonIntervalLength(aStart: number, aEnd: number, bStart: number, bEnd: number): number {
  if (aEnd < bStart || bEnd < aStart) return 0;
  return Math.min(aEnd, bEnd) - Math.max(aStart, bStart);
}

/**
 * MaxRects bin packer for a single fixed-size bin.
 *
 * Keeps a list of maximal free rectangles. Free rectangles may overlap each
 * other, but after every placement none is contained in another.
 */
export class MaxRectsBinPack {
  readonly binWidth: number;
  readonly binHeight: number;

  private _usedRectangles: Rect[] = [];
  private _freeRectangles: Rect[];

  constructor(binWidth: number, binHeight: number) {
    this.binWidth = binWidth;
    this.binHeight = binHeight;
    this._freeRectangles = [{ x: 0, y: 0, width: binWidth, height: binHeight }];
  }

  get freeRectangles(): readonly Rect[] {
    return this._freeRectangles;
  }

  /** Placed rectangles, in placement order. */
  get usedRectangles(): readonly Rect[] {
    return this._usedRectangles;
  }

  /**
   * Places a single `width`×`height` rectangle using `heuristic`.
   *
   * @returns The committed placement (with rotated dimensions if it was
   *   rotated), or a Rect with height 0 when nothing fits.
   */
  insert(width: number, height: number, allowRotation: boolean, heuristic: FreeRectChoiceHeuristic): Rect {
    const { node } = this.findPosition(width, height, allowRotation, heuristic);
    if (isNullRect(node)) return node;

    this.placeRect(node);
    return node;
  }

  /**
   * Places as many of `rects` as fit. Each round scores every remaining rect
   * and commits only the globally best one.
   *
   * @returns Placements in commit order. Rects that did not fit are omitted.
   */
  insertList(rects: readonly Rect[], allowRotation: boolean, heuristic: FreeRectChoiceHeuristic): Rect[] {
    const remaining = [...rects];
    const placed: Rect[] = [];

    while (remaining.length > 0) {
      let bestPrimary = WORST_SCORE;
      let bestSecondary = WORST_SCORE;
      let bestIndex = -1;
      let bestNode = emptyRect();

      remaining.forEach((rect, idx) => {
        const scored = this.scoreRect(rect.width, rect.height, allowRotation, heuristic);
        if (
          scored.primary < bestPrimary ||
          (scored.primary === bestPrimary && scored.secondary < bestSecondary)
        ) {
          bestPrimary = scored.primary;
          bestSecondary = scored.secondary;
          bestNode = scored.node;
          bestIndex = idx;
        }
      });

      if (bestIndex === -1) break;

      this.placeRect(bestNode);
      remaining.splice(bestIndex, 1);
      placed.push(bestNode);
    }

    return placed;
  }

  /**
   * Fraction of the bin area covered by placed rectangles, in [0, 1].
   */
  occupancy(): number {
    let usedArea = 0;
    for (const rect of this._usedRectangles) {
      usedArea += rect.width * rect.height;
    }
    return usedArea / (this.binWidth * this.binHeight);
  }

  /**
   * Commits `node`: splits every free rect it intersects, prunes contained
   * free rects and records `node` as used.
   */
  placeRect(node: Rect): void {
    const kept: Rect[] = [];
    const residuals: Rect[] = [];

    for (const free of this._freeRectangles) {
      const split = splitFreeNode(free, node);
      if (split === null) {
        kept.push(free);
      } else {
        residuals.push(...split);
      }
    }

    this._freeRectangles = pruneFreeList([...kept, ...residuals]);
    this._usedRectangles.push({ ...node });
  }

  /**
   * Scores the best placement for a rect under `heuristic` without committing.
   * Contact-point scores are negated so lower is better for every heuristic.
   */
  scoreRect(width: number, height: number, allowRotation: boolean, heuristic: FreeRectChoiceHeuristic): ScoredPlacement {
    const scored = this.findPosition(width, height, allowRotation, heuristic);

    if (heuristic === 'ContactPointRule') {
      scored.primary = -scored.primary;
      scored.secondary = WORST_SCORE;
    }

    if (isNullRect(scored.node)) {
      scored.primary = WORST_SCORE;
      scored.secondary = WORST_SCORE;
    }

    return scored;
  }

  private findPosition(
    width: number,
    height: number,
    allowRotation: boolean,
    heuristic: FreeRectChoiceHeuristic,
  ): ScoredPlacement {
    switch (heuristic) {
      case 'BestShortSideFit':
        return this.findBestSideFit(width, height, allowRotation, 'short');
      case 'BestLongSideFit':
        return this.findBestSideFit(width, height, allowRotation, 'long');
      case 'BestAreaFit':
        return this.findBestAreaFit(width, height, allowRotation);
      case 'BottomLeftRule':
        return this.findBottomLeft(width, height, allowRotation);
      case 'ContactPointRule':
        return this.findContactPoint(width, height, allowRotation);
      default: {
        const unknown: never = heuristic;
        throw new Error(`Unknown heuristic: ${String(unknown)}`);
      }
    }
  }

  /**
   * Yields every orientation of a `width`×`height` item that fits in `free`.
   */
  private *orientations(free: Rect, width: number, height: number, allowRotation: boolean): Generator<[number, number]> {
    if (free.width >= width && free.height >= height) {
      yield [width, height];
    }
    if (allowRotation && free.width >= height && free.height >= width) {
      yield [height, width];
    }
  }

  // BSSF and BLSF share the leftover pair; `prefer` picks which side is primary.
  private findBestSideFit(
    width: number,
    height: number,
    allowRotation: boolean,
    prefer: 'short' | 'long',
  ): ScoredPlacement {
    const best: ScoredPlacement = { node: emptyRect(), primary: WORST_SCORE, secondary: WORST_SCORE };

    for (const free of this._freeRectangles) {
      for (const [w, h] of this.orientations(free, width, height, allowRotation)) {
        const leftoverHoriz = Math.abs(free.width - w);
        const leftoverVert = Math.abs(free.height - h);
        const shortSideFit = Math.min(leftoverHoriz, leftoverVert);
        const longSideFit = Math.max(leftoverHoriz, leftoverVert);
        const primary = prefer === 'short' ? shortSideFit : longSideFit;
        const secondary = prefer === 'short' ? longSideFit : shortSideFit;

        if (primary < best.primary || (primary === best.primary && secondary < best.secondary)) {
          best.node = { x: free.x, y: free.y, width: w, height: h };
          best.primary = primary;
          best.secondary = secondary;
        }
      }
    }

    return best;
  }

  private findBestAreaFit(width: number, height: number, allowRotation: boolean): ScoredPlacement {
    const best: ScoredPlacement = { node: emptyRect(), primary: WORST_SCORE, secondary: WORST_SCORE };

    for (const free of this._freeRectangles) {
      const areaFit = free.width * free.height - width * height;

      for (const [w, h] of this.orientations(free, width, height, allowRotation)) {
        const shortSideFit = Math.min(Math.abs(free.width - w), Math.abs(free.height - h));

        if (areaFit < best.primary || (areaFit === best.primary && shortSideFit < best.secondary)) {
          best.node = { x: free.x, y: free.y, width: w, height: h };
          best.primary = areaFit;
          best.secondary = shortSideFit;
        }
      }
    }

    return best;
  }

  private findBottomLeft(width: number, height: number, allowRotation: boolean): ScoredPlacement {
    const best: ScoredPlacement = { node: emptyRect(), primary: WORST_SCORE, secondary: WORST_SCORE };

    for (const free of this._freeRectangles) {
      for (const [w, h] of this.orientations(free, width, height, allowRotation)) {
        const topSideY = free.y + h;
        if (topSideY < best.primary || (topSideY === best.primary && free.x < best.secondary)) {
          best.node = { x: free.x, y: free.y, width: w, height: h };
          best.primary = topSideY;
          best.secondary = free.x;
        }
      }
    }

    return best;
  }

  // Primary holds the raw contact score here (higher is better); scoreRect negates it.
  private findContactPoint(width: number, height: number, allowRotation: boolean): ScoredPlacement {
    const best: ScoredPlacement = { node: emptyRect(), primary: -1, secondary: 0 };

    for (const free of this._freeRectangles) {
      for (const [w, h] of this.orientations(free, width, height, allowRotation)) {
        const score = this.contactPointScore(free.x, free.y, w, h);
        if (score > best.primary) {
          best.node = { x: free.x, y: free.y, width: w, height: h };
          best.primary = score;
        }
      }
    }

    return best;
  }

  /**
   * Total length of the candidate's edges that touch the bin border or an
   * already placed rectangle.
   */
  contactPointScore(x: number, y: number, width: number, height: number): number {
    let score = 0;

    if (x === 0 || x + width === this.binWidth) score += height;
    if (y === 0 || y + height === this.binHeight) score += width;

    for (const used of this._usedRectangles) {
      if (used.x === x + width || used.x + used.width === x) {
        score += commonIntervalLength(used.y, used.y + used.height, y, y + height);
      }
      if (used.y === y + height || used.y + used.height === y) {
        score += commonIntervalLength(used.x, used.x + used.width, x, x + width);
      }
    }

    return score;
  }
}

/**
 * Splits `free` around `used`.
 *
 * @returns null when the two do not intersect; otherwise the up to four
 *   residual parts of `free` lying outside `used` (top, bottom, left, right).
 */
export function splitFreeNode(free: Rect, used: Rect): Rect[] | null {
  if (
    used.x >= free.x + free.width ||
    used.x + used.width <= free.x ||
    used.y >= free.y + free.height ||
    used.y + used.height <= free.y
  ) {
    return null;
  }

  const residuals: Rect[] = [];
  const freeRight = free.x + free.width;
  const freeBottom = free.y + free.height;
  const usedRight = used.x + used.width;
  const usedBottom = used.y + used.height;

  if (used.x < freeRight && usedRight > free.x) {
    if (used.y > free.y && used.y < freeBottom) {
      residuals.push({ ...free, height: used.y - free.y });
    }
    if (usedBottom < freeBottom) {
      residuals.push({ ...free, y: usedBottom, height: freeBottom - usedBottom });
    }
  }

  if (used.y < freeBottom && usedBottom > free.y) {
    if (used.x > free.x && used.x < freeRight) {
      residuals.push({ ...free, width: used.x - free.x });
    }
    if (usedRight < freeRight) {
      residuals.push({ ...free, x: usedRight, width: freeRight - usedRight });
    }
  }

  return residuals;
}

/**
 * Drops every free rect contained in another. When two are equal the
 * earlier one is dropped.
 */
export function pruneFreeList(freeRects: readonly Rect[]): Rect[] {
  const removed = new Array<boolean>(freeRects.length).fill(false);

  for (let i = 0; i < freeRects.length; i++) {
    if (removed[i]) continue;
    for (let j = i + 1; j < freeRects.length; j++) {
      if (removed[j]) continue;
      if (isContainedIn(freeRects[i], freeRects[j])) {
        removed[i] = true;
        break;
      }
      if (isContainedIn(freeRects[j], freeRects[i])) {
        removed[j] = true;
      }
    }
  }

  return freeRects.filter((_, idx) => !removed[idx]);
}
