/**
 * The image-like record the packer consumes. Dimensions are post-trim pixels.
 */
export interface PackableImage {
  name: string;
  width: number;
  height: number;
  /** 64-bit content hash, used as a cheap pre-filter for duplicate detection. */
  fingerprint: bigint;
  /** Full content equality; a fingerprint match is only a candidate. */
  equals(other: PackableImage): boolean;
}

/**
 * Where an image landed in its bin.
 * `duplicateOf` is the index of the placement this one aliases, or null.
 */
export interface Point {
  x: number;
  y: number;
  rotated: boolean;
  duplicateOf: number | null;
}
