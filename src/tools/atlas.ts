import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as path from 'node:path';
import { HEURISTICS, type FreeRectChoiceHeuristic } from '../types/heuristic.js';
import { packSession, sortByArea } from '../classes/session.js';
import { type ImageClass } from '../classes/image.js';
import { type PackerClass } from '../classes/packer.js';
import { collectImageFiles, loadImage, loadImages, saveAtlasPng } from '../io/image-io.js';
import { buildAtlas, saveAtlasMetadata, type MetadataFormat } from '../io/atlas-io.js';
import { hashInputs, readCachedHash, removeStaleOutputs, writeCachedHash } from '../io/cache.js';
import { logger, setVerbosity } from '../logger.js';
import * as errors from '../errors.js';

export const ATLAS_SIZES = [64, 128, 256, 512, 1024, 2048, 4096] as const;

/**
 * Zod input schema for the `atlas` tool.
 *
 * - `pack`: load inputs, pack, write `<output>N.png` plus the chosen metadata files
 * - `plan`: same packing, returns the layout and writes nothing
 */
const atlasInputSchema = {
    action: z.enum(['pack', 'plan']).describe('pack (write atlas files) or plan (dry run returning the layout)'),
    output: z
        .string()
        .describe('Output base path without extension. Atlas images are written as <output>0.png, <output>1.png, ...'),
    inputs: z.array(z.string()).min(1).describe('Image files or directories (walked recursively) to pack'),
    size: z.number().int().optional().describe(`Max atlas size: one of ${ATLAS_SIZES.join(', ')} (default 4096)`),
    pad: z.number().int().optional().describe('Padding between images, 0–16 (default 1)'),
    heuristic: z.enum(HEURISTICS).optional().describe('Free-rectangle choice heuristic (default BestShortSideFit)'),
    rotate: z.boolean().optional().describe('Allow rotating images 90° clockwise'),
    unique: z.boolean().optional().describe('Alias duplicate images instead of packing them twice'),
    premultiply: z.boolean().optional().describe('Premultiply pixels by their alpha'),
    trim: z.boolean().optional().describe('Trim transparent borders off images'),
    xml: z.boolean().optional().describe('Write <output>.xml'),
    json: z.boolean().optional().describe('Write <output>.json'),
    binary: z.boolean().optional().describe('Write <output>.bin'),
    defaults: z.boolean().optional().describe('Shorthand for xml, premultiply, trim and unique'),
    force: z.boolean().optional().describe('Repack even if inputs and options are unchanged'),
    verbose: z.number().int().min(0).max(3).optional().describe('Log level: 0 warn, 1 info, 2 debug, 3 trace'),
};

type AtlasArgs = z.infer<z.ZodObject<typeof atlasInputSchema>>;

/**
 * Options after defaults are applied. This is also the build-cache key.
 */
export interface EffectiveOptions {
    size: number;
    pad: number;
    heuristic: FreeRectChoiceHeuristic;
    rotate: boolean;
    unique: boolean;
    premultiply: boolean;
    trim: boolean;
    formats: MetadataFormat[];
}

/**
 * Applies defaults and the `defaults` preset.
 */
export function resolveOptions(args: Omit<AtlasArgs, 'action' | 'output' | 'inputs'>): EffectiveOptions {
    const preset = args.defaults ?? false;
    const formats: MetadataFormat[] = [];
    if (args.json) formats.push('json');
    if (args.xml || preset) formats.push('xml');
    if (args.binary) formats.push('bin');

    return {
        size: args.size ?? 4096,
        pad: args.pad ?? 1,
        heuristic: args.heuristic ?? 'BestShortSideFit',
        rotate: args.rotate ?? false,
        unique: (args.unique ?? false) || preset,
        premultiply: (args.premultiply ?? false) || preset,
        trim: (args.trim ?? false) || preset,
        formats,
    };
}

/**
 * Registers the `atlas` tool on the MCP server.
 */
export function registerAtlasTool(server: McpServer): void {
    server.registerTool(
        'atlas',
        {
            title: 'Atlas',
            description:
                'Pack PNG images into power-of-two texture atlases using MaxRects heuristics, with optional rotation, trimming and duplicate aliasing.',
            inputSchema: atlasInputSchema,
        },
        async (args) => {
            const options = resolveOptions(args);

            if (options.pad < 0 || options.pad > 16) {
                return errors.invalidPadding(options.pad);
            }
            if (!ATLAS_SIZES.some((s) => s === options.size)) {
                return errors.invalidArgument(`size must be one of ${ATLAS_SIZES.join(', ')}, got ${String(options.size)}.`);
            }

            setVerbosity(args.verbose ?? 0);
            logger.trace({ options }, 'options');

            try {
                switch (args.action) {
                    case 'pack':
                        return await handlePack(args.output, args.inputs, options, args.force ?? false);
                    case 'plan':
                        return await handlePlan(args.output, args.inputs, options);
                    default:
                        return errors.invalidArgument(`Unknown atlas action: ${String(args.action)}`);
                }
            } catch (e: unknown) {
                const msg = e instanceof Error ? e.message : String(e);
                return errors.domainError(msg);
            }
        },
    );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

/**
 * Packs `images` into bins. The array is sorted and drained in place.
 */
function runPacking(images: ImageClass[], options: EffectiveOptions): PackerClass<ImageClass>[] {
    const totalBytes = images.reduce((sum, img) => sum + img.originalSize, 0);
    logger.info(`loaded ${String(images.length)} images (${String(totalBytes)} bytes).`);

    return packSession(sortByArea(images), {
        size: options.size,
        pad: options.pad,
        unique: options.unique,
        rotate: options.rotate,
        heuristic: options.heuristic,
    });
}

async function handlePack(output: string, inputs: string[], options: EffectiveOptions, force: boolean) {
    const files = await collectImageFiles(inputs, logger);
    if (files.length === 0) {
        return errors.noImagesFound();
    }

    const name = path.basename(output);
    const hash = await hashInputs({ ...options }, files);
    if (!force && (await readCachedHash(output)) === hash) {
        logger.info(`Atlas is unchanged: ${name}`);
        return {
            content: [
                {
                    type: 'text' as const,
                    text: JSON.stringify({ message: `Atlas '${name}' is unchanged.`, cached: true, textures: [], files: [] }),
                },
            ],
        };
    }

    await removeStaleOutputs(output);

    // Walk again: the output may live inside an input directory.
    logger.info('loading images...');
    const images: ImageClass[] = [];
    for (const file of await collectImageFiles(inputs, logger)) {
        logger.info(`Reading file ${file}`);
        images.push(await loadImage(file, options));
    }
    const imageCount = images.length;

    const bins = runPacking(images, options);

    const written: string[] = [];
    for (const [idx, bin] of bins.entries()) {
        const outPath = `${output}${String(idx)}.png`;
        logger.info(`writing image ${outPath}`);
        const bytes = await saveAtlasPng(outPath, bin);
        logger.info(`saving atlas. image size: ${String(bytes)} bytes`);
        written.push(outPath);
    }

    const atlas = buildAtlas(name, bins);
    written.push(...(await saveAtlasMetadata(output, atlas, options.formats)));
    await writeCachedHash(output, hash);

    return {
        content: [
            {
                type: 'text' as const,
                text: JSON.stringify({
                    message: `Packed ${String(imageCount)} image(s) into ${String(bins.length)} atlas(es).`,
                    cached: false,
                    textures: bins.map((bin, idx) => ({
                        name: atlas.textures[idx].name,
                        width: bin.width,
                        height: bin.height,
                        images: bin.images.length,
                        occupancy: bin.occupancy,
                    })),
                    files: written,
                }),
            },
        ],
    };
}

async function handlePlan(output: string, inputs: string[], options: EffectiveOptions) {
    const images = await loadImages(inputs, options, logger);
    if (images.length === 0) {
        return errors.noImagesFound();
    }

    const bins = runPacking(images, options);
    const atlas = buildAtlas(path.basename(output), bins);

    return {
        content: [
            {
                type: 'text' as const,
                text: JSON.stringify({
                    textures: bins.map((bin, idx) => ({
                        name: atlas.textures[idx].name,
                        width: bin.width,
                        height: bin.height,
                        occupancy: bin.occupancy,
                        images: atlas.textures[idx].images,
                    })),
                }),
            },
        ],
    };
}
