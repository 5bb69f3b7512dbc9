import { MaxRectsBinPack } from '../algorithms/max-rects.js';
import { isNullRect } from '../algorithms/rect.js';
import { type FreeRectChoiceHeuristic } from '../types/heuristic.js';
import { type PackableImage, type Point } from '../types/image.js';
import { logger } from '../logger.js';

export interface PackOptions {
    /** Alias content-identical images instead of placing them again. */
    unique: boolean;
    /** Allow 90° rotation of images. */
    rotate: boolean;
    heuristic: FreeRectChoiceHeuristic;
}

/**
 * Packs images into one fixed-size bin.
 *
 * `images` and `points` are co-indexed: `points[i]` is where `images[i]` landed.
 * After `pack()` the bin's `width`/`height` are shrunk by halving to the
 * smallest size that still holds every placement.
 */
export class PackerClass<T extends PackableImage> {
    width: number;
    height: number;
    readonly pad: number;

    readonly images: T[] = [];
    readonly points: Point[] = [];

    /** Fingerprint → index into `images`/`points` of the first placement seen. */
    private readonly _dupLookup: Map<bigint, number> = new Map();
    private _occupancy = 0;

    constructor(width: number, height: number, pad: number) {
        this.width = width;
        this.height = height;
        this.pad = pad;
    }

    /** Fraction of the original bin area used by placements, padding included. */
    get occupancy(): number {
        return this._occupancy;
    }

    /**
     * Consumes images from the end of `queue` (sorted ascending by area, so the
     * largest go first) until one does not fit. That image is pushed back onto
     * the end of the queue for the next bin.
     */
    pack(queue: T[], options: PackOptions): void {
        const bin = new MaxRectsBinPack(this.width, this.height);
        let maxX = 0;
        let maxY = 0;

        logger.info('packing begin...');

        let image = queue.pop();
        while (image !== undefined) {
            logger.debug({ remaining: queue.length }, image.name);

            if (options.unique && this.aliasDuplicate(image)) {
                image = queue.pop();
                continue;
            }

            const rect = bin.insert(image.width + this.pad, image.height + this.pad, options.rotate, options.heuristic);
            if (isNullRect(rect)) {
                queue.push(image);
                break;
            }

            if (options.unique) {
                this._dupLookup.set(image.fingerprint, this.points.length);
            }

            this.points.push({
                x: rect.x,
                y: rect.y,
                rotated: options.rotate && image.width !== rect.width - this.pad,
                duplicateOf: null,
            });
            this.images.push(image);

            maxX = Math.max(rect.x + rect.width, maxX);
            maxY = Math.max(rect.y + rect.height, maxY);

            image = queue.pop();
        }

        this._occupancy = bin.occupancy();
        logger.info('packing complete. resizing...');

        // An empty bin is reported at full size; the session driver treats it as fatal.
        if (this.points.length === 0) return;

        while (Math.floor(this.width / 2) >= maxX) {
            this.width = Math.floor(this.width / 2);
        }
        while (Math.floor(this.height / 2) >= maxY) {
            this.height = Math.floor(this.height / 2);
        }
    }

    /**
     * Records `image` as an alias of an identical earlier placement, if any.
     */
    private aliasDuplicate(image: T): boolean {
        const idx = this._dupLookup.get(image.fingerprint);
        if (idx === undefined || !image.equals(this.images[idx])) return false;

        this.points.push({ ...this.points[idx], duplicateOf: idx });
        this.images.push(image);
        logger.debug({ image: image.name, duplicateOf: this.images[idx].name }, 'duplicate found');
        return true;
    }
}
