import { type PackableImage } from '../types/image.js';
import { PackerClass, type PackOptions } from './packer.js';
import { logger } from '../logger.js';
import * as errors from '../errors.js';

export interface SessionOptions extends PackOptions {
    /** Side length of every (square) bin before shrinking. */
    size: number;
    pad: number;
}

/**
 * Sorts images ascending by area so `PackerClass.pack` consumes the largest first.
 * The sort is stable: equal areas keep their input order.
 */
export function sortByArea<T extends PackableImage>(images: T[]): T[] {
    return images.sort((a, b) => a.width * a.height - b.width * b.height);
}

/**
 * Packs the whole `queue` into as many bins as needed, emptying it.
 *
 * @throws Error when a fresh bin accepts no image: the next image is larger
 *   than the bin itself.
 */
export function packSession<T extends PackableImage>(queue: T[], options: SessionOptions): PackerClass<T>[] {
    if (options.pad < 0 || options.pad > 16) {
        throw new Error(errors.messageOf(errors.invalidPadding(options.pad)));
    }

    const bins: PackerClass<T>[] = [];

    while (queue.length > 0) {
        logger.info(`packing ${String(queue.length)} images...`);

        const packer = new PackerClass<T>(options.size, options.size, options.pad);
        packer.pack(queue, options);

        if (packer.images.length === 0) {
            const stuck = queue[queue.length - 1];
            logger.error(`packing failed, could not fit image ${stuck.name}`);
            throw new Error(errors.messageOf(errors.cannotFitImage(stuck.name, options.size)));
        }

        logger.info(`finished packing ${String(bins.length)} - (${String(packer.width)}x${String(packer.height)})`);
        bins.push(packer);
    }

    return bins;
}
