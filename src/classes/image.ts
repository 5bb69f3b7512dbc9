import { type PackableImage } from '../types/image.js';
import { cropRgba, findOpaqueBounds, premultiplyAlpha } from '../algorithms/trim.js';
import { fingerprint } from '../algorithms/fingerprint.js';
import { logger } from '../logger.js';

export interface ImagePreprocessOptions {
    premultiply: boolean;
    trim: boolean;
}

/**
 * A decoded RGBA image ready for packing.
 *
 * `width`/`height` describe the (possibly trimmed) pixels in `data`;
 * `frameX`/`frameY` are the negated trim offsets and `frameWidth`/`frameHeight`
 * the original source size, so consumers can restore the untrimmed frame.
 */
export class ImageClass implements PackableImage {
    readonly name: string;
    readonly width: number;
    readonly height: number;
    readonly frameX: number;
    readonly frameY: number;
    readonly frameWidth: number;
    readonly frameHeight: number;
    readonly data: Uint8Array;
    readonly fingerprint: bigint;
    /** Byte size of the source file, 0 for images built in memory. */
    readonly originalSize: number;

    private constructor(init: {
        name: string;
        width: number;
        height: number;
        frameX: number;
        frameY: number;
        frameWidth: number;
        frameHeight: number;
        data: Uint8Array;
        originalSize: number;
        fingerprint?: bigint;
    }) {
        this.name = init.name;
        this.width = init.width;
        this.height = init.height;
        this.frameX = init.frameX;
        this.frameY = init.frameY;
        this.frameWidth = init.frameWidth;
        this.frameHeight = init.frameHeight;
        this.data = init.data;
        this.originalSize = init.originalSize;
        this.fingerprint = init.fingerprint ?? fingerprint(init.width, init.height, init.data);
    }

    /**
     * Builds an image from raw RGBA pixels, applying premultiplication and then
     * transparent-border trimming when requested. `data` is copied.
     */
    static fromRgba(
        name: string,
        width: number,
        height: number,
        data: Uint8Array,
        options: ImagePreprocessOptions,
        originalSize: number = 0,
    ): ImageClass {
        let pixels: Uint8Array = Uint8Array.from(data);

        if (options.premultiply) {
            premultiplyAlpha(pixels);
        }

        let bounds = { x: 0, y: 0, width, height };
        if (options.trim) {
            const opaque = findOpaqueBounds(pixels, width, height);
            if (opaque === null) {
                logger.warn({ image: name }, 'image is completely transparent');
            } else {
                bounds = opaque;
            }
        }

        if (bounds.width !== width || bounds.height !== height) {
            pixels = cropRgba(pixels, width, bounds);
        }

        return new ImageClass({
            name,
            width: bounds.width,
            height: bounds.height,
            frameX: 0 - bounds.x,
            frameY: 0 - bounds.y,
            frameWidth: width,
            frameHeight: height,
            data: pixels,
            originalSize,
        });
    }

    /**
     * A fully transparent canvas, used as the compositing target for an atlas.
     */
    static empty(width: number, height: number): ImageClass {
        return new ImageClass({
            name: '',
            width,
            height,
            frameX: 0,
            frameY: 0,
            frameWidth: width,
            frameHeight: height,
            data: new Uint8Array(width * height * 4),
            originalSize: 0,
            fingerprint: 0n,
        });
    }

    /**
     * Pixel-exact equality: same dimensions and identical bytes.
     */
    equals(other: PackableImage): boolean {
        if (!(other instanceof ImageClass)) return false;
        if (this.width !== other.width || this.height !== other.height) return false;
        if (this.data.length !== other.data.length) return false;

        for (let i = 0; i < this.data.length; i++) {
            if (this.data[i] !== other.data[i]) return false;
        }
        return true;
    }

    /**
     * Blits `src` with its top-left corner at (tx, ty).
     */
    copyPixels(src: ImageClass, tx: number, ty: number): void {
        const rowBytes = src.width * 4;
        for (let y = 0; y < src.height; y++) {
            const from = y * rowBytes;
            this.data.set(src.data.subarray(from, from + rowBytes), ((ty + y) * this.width + tx) * 4);
        }
    }

    /**
     * Blits `src` rotated 90° clockwise; the destination region is
     * `src.height` wide and `src.width` tall.
     */
    copyPixelsRotated(src: ImageClass, tx: number, ty: number): void {
        const r = src.height - 1;
        for (let y = 0; y < src.width; y++) {
            for (let x = 0; x < src.height; x++) {
                const from = ((r - x) * src.width + y) * 4;
                const to = ((ty + y) * this.width + tx + x) * 4;
                this.data.set(src.data.subarray(from, from + 4), to);
            }
        }
    }
}
