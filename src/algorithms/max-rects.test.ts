import { describe, it, expect } from 'vitest';
import {
  MaxRectsBinPack,
  commonIntervalLength,
  pruneFreeList,
  splitFreeNode,
} from './max-rects.js';
import { DisjointRectCollection, isContainedIn } from './rect.js';
import { HEURISTICS, type FreeRectChoiceHeuristic } from '../types/heuristic.js';
import { type Rect } from '../types/rect.js';

/** 100×100 bin with a 30×40 block at the origin. Free: bottom strip, right strip. */
function makeNotchedBin(): MaxRectsBinPack {
  const bin = new MaxRectsBinPack(100, 100);
  bin.placeRect({ x: 0, y: 0, width: 30, height: 40 });
  return bin;
}

function expectNoContainedFreeRects(bin: MaxRectsBinPack) {
  const free = bin.freeRectangles;
  for (let i = 0; i < free.length; i++) {
    for (let j = 0; j < free.length; j++) {
      if (i === j) continue;
      expect(isContainedIn(free[i], free[j]), `free ${String(i)} inside free ${String(j)}`).toBe(false);
    }
  }
}

describe('MaxRectsBinPack', () => {
  it('starts with one free rect spanning the bin', () => {
    const bin = new MaxRectsBinPack(64, 32);
    expect(bin.freeRectangles).toEqual([{ x: 0, y: 0, width: 64, height: 32 }]);
    expect(bin.usedRectangles).toEqual([]);
    expect(bin.occupancy()).toBe(0);
  });

  it.each(HEURISTICS)('%s places the first rect at the origin', (heuristic) => {
    const bin = new MaxRectsBinPack(100, 100);
    expect(bin.insert(30, 20, false, heuristic)).toEqual({ x: 0, y: 0, width: 30, height: 20 });
    expect(bin.usedRectangles).toHaveLength(1);
  });

  it.each(HEURISTICS)('%s returns the null sentinel and mutates nothing when the rect does not fit', (heuristic) => {
    const bin = makeNotchedBin();
    const freeBefore = [...bin.freeRectangles];

    const result = bin.insert(101, 10, true, heuristic);

    expect(result.height).toBe(0);
    expect(bin.freeRectangles).toEqual(freeBefore);
    expect(bin.usedRectangles).toHaveLength(1);
  });

  it('rotates a rect that only fits sideways when rotation is allowed', () => {
    const bin = new MaxRectsBinPack(50, 100);
    expect(bin.insert(100, 50, false, 'BestShortSideFit').height).toBe(0);
    expect(bin.insert(100, 50, true, 'BestShortSideFit')).toEqual({ x: 0, y: 0, width: 50, height: 100 });
  });

  it('splits the free space around a placement', () => {
    const bin = makeNotchedBin();
    expect(bin.freeRectangles).toEqual([
      { x: 0, y: 40, width: 100, height: 60 },
      { x: 30, y: 0, width: 70, height: 100 },
    ]);
    expect(bin.usedRectangles).toEqual([{ x: 0, y: 0, width: 30, height: 40 }]);
  });

  it('BestShortSideFit breaks short-side ties on the smaller long-side leftover', () => {
    // Bottom strip leaves (40, 10), right strip leaves (10, 50): short sides tie at 10.
    const bin = makeNotchedBin();
    expect(bin.insert(60, 50, false, 'BestShortSideFit')).toEqual({ x: 0, y: 40, width: 60, height: 50 });
  });

  it('BestLongSideFit breaks long-side ties on the smaller short-side leftover', () => {
    // Bottom strip leaves (65, 25), right strip leaves (35, 65): long sides tie at 65.
    const bin = makeNotchedBin();
    expect(bin.insert(35, 35, false, 'BestLongSideFit')).toEqual({ x: 0, y: 40, width: 35, height: 35 });
  });

  it('BestAreaFit picks the free rect with the least leftover area', () => {
    // Bottom strip area 6000, right strip 7000.
    const bin = makeNotchedBin();
    expect(bin.insert(20, 20, false, 'BestAreaFit')).toEqual({ x: 0, y: 40, width: 20, height: 20 });
  });

  it('BottomLeftRule settles on the lowest top edge', () => {
    const bin = makeNotchedBin();
    expect(bin.insert(20, 20, false, 'BottomLeftRule')).toEqual({ x: 30, y: 0, width: 20, height: 20 });
  });

  it('ContactPointRule keeps the first of equally scored candidates', () => {
    // Both candidates touch one bin edge (20) and the placed block (20).
    const bin = makeNotchedBin();
    expect(bin.contactPointScore(0, 40, 20, 20)).toBe(40);
    expect(bin.contactPointScore(30, 0, 20, 20)).toBe(40);
    expect(bin.insert(20, 20, false, 'ContactPointRule')).toEqual({ x: 0, y: 40, width: 20, height: 20 });
  });

  it('ContactPointRule prefers the candidate touching more edges', () => {
    const bin = new MaxRectsBinPack(100, 100);
    bin.placeRect({ x: 0, y: 0, width: 100, height: 30 });
    bin.placeRect({ x: 0, y: 30, width: 40, height: 70 });
    // Only free rect is (40,30,60,70); the item at its origin touches both placed rects.
    expect(bin.contactPointScore(40, 30, 60, 70)).toBe(60 + 70 + 60 + 70);
    expect(bin.insert(60, 70, false, 'ContactPointRule')).toEqual({ x: 40, y: 30, width: 60, height: 70 });
    expect(bin.occupancy()).toBe(1);
  });

  it('scores a whole-bin candidate by its four bin edges', () => {
    const bin = new MaxRectsBinPack(100, 80);
    expect(bin.contactPointScore(0, 0, 100, 80)).toBe(180);
  });

  it('scoreRect negates contact scores and reports the worst score for misses', () => {
    const bin = new MaxRectsBinPack(100, 100);
    const hit = bin.scoreRect(10, 10, false, 'ContactPointRule');
    expect(hit.node).toEqual({ x: 0, y: 0, width: 10, height: 10 });
    expect(hit.primary).toBe(-20);

    const miss = bin.scoreRect(200, 10, false, 'BestAreaFit');
    expect(miss.node.height).toBe(0);
    expect(miss.primary).toBe(Number.MAX_SAFE_INTEGER);
    expect(miss.secondary).toBe(Number.MAX_SAFE_INTEGER);
  });

  describe('insertList', () => {
    it('commits the globally best rect each round', () => {
      const bin = new MaxRectsBinPack(100, 100);
      const rects: Rect[] = [
        { x: 0, y: 0, width: 10, height: 10 },
        { x: 0, y: 0, width: 50, height: 50 },
        { x: 0, y: 0, width: 100, height: 50 },
      ];

      expect(bin.insertList(rects, false, 'BestShortSideFit')).toEqual([
        { x: 0, y: 0, width: 100, height: 50 },
        { x: 0, y: 50, width: 50, height: 50 },
        { x: 50, y: 50, width: 10, height: 10 },
      ]);
    });

    it('omits rects that never fit and leaves the input untouched', () => {
      const bin = new MaxRectsBinPack(10, 10);
      const rects: Rect[] = [
        { x: 0, y: 0, width: 20, height: 20 },
        { x: 0, y: 0, width: 5, height: 5 },
      ];

      expect(bin.insertList(rects, true, 'BottomLeftRule')).toEqual([{ x: 0, y: 0, width: 5, height: 5 }]);
      expect(rects).toHaveLength(2);
    });
  });

  describe('packing invariants', () => {
    const sizes: Array<[number, number]> = Array.from({ length: 40 }, (_, i) => [
      4 + ((i * 7) % 23),
      4 + ((i * 11) % 19),
    ]);

    const cases: Array<[FreeRectChoiceHeuristic, boolean]> = HEURISTICS.flatMap(
      (h): Array<[FreeRectChoiceHeuristic, boolean]> => [[h, false], [h, true]],
    );

    it.each(cases)('%s (rotate=%s) keeps placements disjoint, inside the bin and the free list pruned', (heuristic, rotate) => {
      const bin = new MaxRectsBinPack(128, 128);
      const placed = new DisjointRectCollection();
      let area = 0;

      for (const [w, h] of sizes) {
        const node = bin.insert(w, h, rotate, heuristic);
        if (node.height === 0) continue;

        expect(placed.add(node)).toBe(true);
        expect(node.x).toBeGreaterThanOrEqual(0);
        expect(node.y).toBeGreaterThanOrEqual(0);
        expect(node.x + node.width).toBeLessThanOrEqual(128);
        expect(node.y + node.height).toBeLessThanOrEqual(128);
        expect(node.width * node.height).toBe(w * h);
        expectNoContainedFreeRects(bin);
        area += node.width * node.height;
      }

      expect(area).toBeLessThanOrEqual(128 * 128);
      expect(bin.occupancy()).toBeCloseTo(area / (128 * 128));
      expect(bin.occupancy()).toBeGreaterThan(0);
      expect(bin.occupancy()).toBeLessThanOrEqual(1);
    });

    it.each(HEURISTICS)('%s is deterministic across runs', (heuristic) => {
      const run = () => {
        const bin = new MaxRectsBinPack(96, 96);
        return sizes.map(([w, h]) => bin.insert(w, h, true, heuristic));
      };
      expect(run()).toEqual(run());
    });
  });
});

describe('splitFreeNode', () => {
  it('returns null when the rects do not intersect', () => {
    expect(splitFreeNode({ x: 0, y: 0, width: 10, height: 10 }, { x: 10, y: 0, width: 5, height: 5 })).toBeNull();
  });

  it('yields four residuals around a centered placement', () => {
    expect(splitFreeNode({ x: 0, y: 0, width: 10, height: 10 }, { x: 4, y: 4, width: 2, height: 2 })).toEqual([
      { x: 0, y: 0, width: 10, height: 4 },
      { x: 0, y: 6, width: 10, height: 4 },
      { x: 0, y: 0, width: 4, height: 10 },
      { x: 6, y: 0, width: 4, height: 10 },
    ]);
  });

  it('yields nothing when the placement covers the free rect', () => {
    expect(splitFreeNode({ x: 2, y: 2, width: 4, height: 4 }, { x: 0, y: 0, width: 10, height: 10 })).toEqual([]);
  });
});

describe('pruneFreeList', () => {
  it('drops contained rects and keeps one of two equal rects', () => {
    const pruned = pruneFreeList([
      { x: 0, y: 0, width: 10, height: 10 },
      { x: 2, y: 2, width: 3, height: 3 },
      { x: 0, y: 0, width: 10, height: 10 },
      { x: 5, y: 0, width: 10, height: 4 },
    ]);
    expect(pruned).toEqual([
      { x: 0, y: 0, width: 10, height: 10 },
      { x: 5, y: 0, width: 10, height: 4 },
    ]);
  });
});

describe('commonIntervalLength', () => {
  it('measures overlapping spans', () => {
    expect(commonIntervalLength(0, 10, 5, 20)).toBe(5);
    expect(commonIntervalLength(0, 10, 10, 20)).toBe(0);
    expect(commonIntervalLength(0, 10, 11, 20)).toBe(0);
  });
});
