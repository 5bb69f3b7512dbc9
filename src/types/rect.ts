/**
 * Axis-aligned integer rectangle. A Rect with `height === 0` is the
 * "does not fit" sentinel returned by the bin packer.
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}
