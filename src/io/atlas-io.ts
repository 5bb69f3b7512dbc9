import * as fs from 'node:fs/promises';
import { type Atlas, type AtlasImage, type Texture } from '../types/atlas.js';
import { type ImageClass } from '../classes/image.js';
import { type PackerClass } from '../classes/packer.js';
import * as errors from '../errors.js';

export type MetadataFormat = 'json' | 'xml' | 'bin';

/**
 * Builds the atlas description for a packing session. Texture `i` is named
 * `${name}${i}`, matching the PNG written for bin `i`.
 */
export function buildAtlas(name: string, bins: PackerClass<ImageClass>[]): Atlas {
    return {
        textures: bins.map((bin, idx): Texture => ({
            name: `${name}${String(idx)}`,
            images: bin.images.map((img, i): AtlasImage => ({
                name: img.name,
                x: bin.points[i].x,
                y: bin.points[i].y,
                width: img.width,
                height: img.height,
                frameX: img.frameX,
                frameY: img.frameY,
                frameWidth: img.frameWidth,
                frameHeight: img.frameHeight,
                rotated: bin.points[i].rotated,
            })),
        })),
    };
}

// ---------------------------------------------------------------------------
// JSON
// ---------------------------------------------------------------------------

/**
 * Pretty-printed JSON with the compact keys game runtimes read:
 * `t` textures, `n` name, `imgs` images, `w`/`h` size, `fx`/`fy`/`fw`/`fh` frame, `r` rotated.
 */
export function atlasToJson(atlas: Atlas): string {
    const doc = {
        t: atlas.textures.map((texture) => ({
            n: texture.name,
            imgs: texture.images.map((img) => ({
                n: img.name,
                x: img.x,
                y: img.y,
                w: img.width,
                h: img.height,
                fx: img.frameX,
                fy: img.frameY,
                fw: img.frameWidth,
                fh: img.frameHeight,
                r: img.rotated,
            })),
        })),
    };
    return JSON.stringify(doc, null, 2);
}

// ---------------------------------------------------------------------------
// XML
// ---------------------------------------------------------------------------

function escapeXml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

export function atlasToXml(atlas: Atlas): string {
    const lines = ['<?xml version="1.0" encoding="utf-8"?>', '<Atlas>'];

    for (const texture of atlas.textures) {
        lines.push(`  <Texture n="${escapeXml(texture.name)}">`);
        for (const img of texture.images) {
            const attrs = [
                `n="${escapeXml(img.name)}"`,
                `x="${String(img.x)}"`,
                `y="${String(img.y)}"`,
                `w="${String(img.width)}"`,
                `h="${String(img.height)}"`,
                `fx="${String(img.frameX)}"`,
                `fy="${String(img.frameY)}"`,
                `fw="${String(img.frameWidth)}"`,
                `fh="${String(img.frameHeight)}"`,
                `r="${img.rotated ? '1' : '0'}"`,
            ];
            lines.push(`    <Image ${attrs.join(' ')} />`);
        }
        lines.push('  </Texture>');
    }

    lines.push('</Atlas>');
    return lines.join('\n') + '\n';
}

// ---------------------------------------------------------------------------
// Binary
// ---------------------------------------------------------------------------

/**
 * Little-endian writer for the binary layout: u64 lengths before sequences
 * and UTF-8 strings, i32 numbers, u8 booleans.
 */
class BinaryWriter {
    private readonly chunks: Buffer[] = [];

    u64(value: number): void {
        const buf = Buffer.alloc(8);
        buf.writeBigUInt64LE(BigInt(value));
        this.chunks.push(buf);
    }

    i32(value: number): void {
        const buf = Buffer.alloc(4);
        buf.writeInt32LE(value);
        this.chunks.push(buf);
    }

    bool(value: boolean): void {
        this.chunks.push(Buffer.from([value ? 1 : 0]));
    }

    string(value: string): void {
        const bytes = Buffer.from(value, 'utf8');
        this.u64(bytes.length);
        this.chunks.push(bytes);
    }

    finish(): Buffer {
        return Buffer.concat(this.chunks);
    }
}

export function atlasToBinary(atlas: Atlas): Buffer {
    const w = new BinaryWriter();

    w.u64(atlas.textures.length);
    for (const texture of atlas.textures) {
        w.string(texture.name);
        w.u64(texture.images.length);
        for (const img of texture.images) {
            w.string(img.name);
            w.i32(img.x);
            w.i32(img.y);
            w.i32(img.width);
            w.i32(img.height);
            w.i32(img.frameX);
            w.i32(img.frameY);
            w.i32(img.frameWidth);
            w.i32(img.frameHeight);
            w.bool(img.rotated);
        }
    }

    return w.finish();
}

/**
 * Writes the requested metadata files next to `basePath` (`basePath.json`,
 * `basePath.xml`, `basePath.bin`).
 *
 * @returns The paths written, in json, xml, bin order.
 */
export async function saveAtlasMetadata(basePath: string, atlas: Atlas, formats: MetadataFormat[]): Promise<string[]> {
    const written: string[] = [];

    for (const format of (['json', 'xml', 'bin'] as const).filter((f) => formats.includes(f))) {
        const outPath = `${basePath}.${format}`;
        const contents = format === 'json' ? atlasToJson(atlas) : format === 'xml' ? atlasToXml(atlas) : atlasToBinary(atlas);
        try {
            await fs.writeFile(outPath, contents);
        } catch {
            throw new Error(errors.messageOf(errors.cannotWritePath(outPath)));
        }
        written.push(outPath);
    }

    return written;
}
