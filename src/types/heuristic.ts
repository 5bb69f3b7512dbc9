/**
 * Free-rectangle choice heuristics for the MaxRects bin packer.
 *
 * - BestShortSideFit: place against the short side of the free rect it fits best.
 * - BestLongSideFit: place against the long side of the free rect it fits best.
 * - BestAreaFit: place into the smallest free rect it fits.
 * - BottomLeftRule: Tetris-style, as low and then as far left as possible.
 * - ContactPointRule: touch the bin edges and placed rects as much as possible.
 */
export const HEURISTICS = [
  'BestShortSideFit',
  'BestLongSideFit',
  'BestAreaFit',
  'BottomLeftRule',
  'ContactPointRule',
] as const;

export type FreeRectChoiceHeuristic = (typeof HEURISTICS)[number];
