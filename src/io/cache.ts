import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createHash } from 'node:crypto';

/**
 * Content hash of a packing run: the effective options plus the bytes of
 * every input image, in order. Equal hashes mean an identical atlas.
 */
export async function hashInputs(options: Record<string, unknown>, files: string[]): Promise<string> {
    const hash = createHash('sha256');
    hash.update(JSON.stringify(options));
    for (const file of files) {
        hash.update(file);
        hash.update(await fs.readFile(file));
    }
    return hash.digest('hex');
}

function hashPath(output: string): string {
    return `${output}.hash`;
}

/**
 * Returns the hash stored by the last successful run, or null if there is none.
 */
export async function readCachedHash(output: string): Promise<string | null> {
    try {
        return await fs.readFile(hashPath(output), 'utf8');
    } catch (error: unknown) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return null;
        }
        throw error;
    }
}

export async function writeCachedHash(output: string, hash: string): Promise<void> {
    await fs.writeFile(hashPath(output), hash, 'utf8');
}

/**
 * Deletes the outputs of a previous run: the hash and metadata files next to
 * `output` and every `<name>*.<extension>` atlas image in its directory.
 *
 * @returns The paths removed.
 */
export async function removeStaleOutputs(output: string, extension: string = 'png'): Promise<string[]> {
    const dir = path.dirname(output);
    const name = path.basename(output);
    const removed: string[] = [];

    let entries: string[];
    try {
        entries = await fs.readdir(dir);
    } catch {
        return removed;
    }

    const metadata = new Set(['hash', 'bin', 'xml', 'json'].map((ext) => `${name}.${ext}`));
    for (const entry of entries.sort()) {
        const isAtlasImage = entry.startsWith(name) && entry.endsWith(`.${extension}`);
        if (metadata.has(entry) || isAtlasImage) {
            const target = path.join(dir, entry);
            await fs.rm(target, { force: true });
            removed.push(target);
        }
    }

    return removed;
}
