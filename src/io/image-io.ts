import * as fs from 'node:fs/promises';
import { type Stats } from 'node:fs';
import * as path from 'node:path';
import { PNG } from 'pngjs';
import { ImageClass, type ImagePreprocessOptions } from '../classes/image.js';
import { type PackerClass } from '../classes/packer.js';
import { type Logger } from '../logger.js';
import * as errors from '../errors.js';

/**
 * True for files pngjs can decode.
 */
export function isImageFile(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === '.png';
}

/**
 * Expands `inputs` (files or directories, walked recursively with entries in
 * name order) into the list of image files to pack. Non-image files are skipped.
 */
export async function collectImageFiles(inputs: string[], log?: Logger): Promise<string[]> {
    const files: string[] = [];

    const visit = async (entry: string): Promise<void> => {
        let stat: Stats;
        try {
            stat = await fs.stat(entry);
        } catch {
            throw new Error(errors.messageOf(errors.inputNotFound(entry)));
        }

        if (stat.isDirectory()) {
            log?.info(`Reading directory ${entry}`);
            const children = (await fs.readdir(entry)).sort();
            for (const child of children) {
                await visit(path.join(entry, child));
            }
        } else if (isImageFile(entry)) {
            files.push(entry);
        } else {
            log?.info(`File ${entry} is not an image, skipping...`);
        }
    };

    for (const input of inputs) {
        await visit(input);
    }
    return files;
}

/**
 * Logical image name: the path without its extension, with forward slashes.
 */
export function imageName(filePath: string): string {
    const parsed = path.parse(filePath);
    return path.join(parsed.dir, parsed.name).split(path.sep).join('/');
}

/**
 * Reads and decodes one PNG file into a preprocessed ImageClass.
 */
export async function loadImage(filePath: string, options: ImagePreprocessOptions): Promise<ImageClass> {
    let buf: Buffer;
    try {
        buf = await fs.readFile(filePath);
    } catch (error: unknown) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new Error(errors.messageOf(errors.inputNotFound(filePath)));
        }
        throw error;
    }

    let png: { width: number; height: number; data: Buffer };
    try {
        png = PNG.sync.read(buf);
    } catch {
        throw new Error(errors.messageOf(errors.imageDecodeFailed(filePath)));
    }

    return ImageClass.fromRgba(imageName(filePath), png.width, png.height, png.data, options, buf.length);
}

/**
 * Loads every image found under `inputs`.
 */
export async function loadImages(
    inputs: string[],
    options: ImagePreprocessOptions,
    log?: Logger,
): Promise<ImageClass[]> {
    const files = await collectImageFiles(inputs, log);
    const images: ImageClass[] = [];
    for (const file of files) {
        log?.info(`Reading file ${file}`);
        images.push(await loadImage(file, options));
    }
    return images;
}

/**
 * Renders a packed bin into an RGBA canvas of the bin's final size.
 * Duplicates are skipped: they alias an already drawn placement.
 */
export function compose(bin: PackerClass<ImageClass>): ImageClass {
    const canvas = ImageClass.empty(bin.width, bin.height);

    bin.points.forEach((point, i) => {
        if (point.duplicateOf !== null) return;
        if (point.rotated) {
            canvas.copyPixelsRotated(bin.images[i], point.x, point.y);
        } else {
            canvas.copyPixels(bin.images[i], point.x, point.y);
        }
    });

    return canvas;
}

/**
 * Encodes an RGBA image as PNG.
 */
export function encodePng(image: ImageClass): Buffer {
    const png = new PNG({ width: image.width, height: image.height });
    png.data = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
    return PNG.sync.write(png);
}

/**
 * Composes `bin` and writes it as a PNG file.
 *
 * @returns The number of bytes written.
 */
export async function saveAtlasPng(filePath: string, bin: PackerClass<ImageClass>): Promise<number> {
    const encoded = encodePng(compose(bin));
    try {
        await fs.writeFile(filePath, encoded);
    } catch {
        throw new Error(errors.messageOf(errors.cannotWritePath(filePath)));
    }
    return encoded.length;
}
