import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { ExportError } from '../errors.js';
import { OTHER_OBJECT_TYPES } from '../types.js';
import type { SourceObject, SourceScene } from '../types.js';
import type { Logger } from './logger.js';

const IDENTITY_MATRIX = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];

const MatrixSchema = z.array(z.number()).length(16);
const RGBSchema = z.tuple([z.number(), z.number(), z.number()]);

const AnimationSchema = z.object({
    action: z.string().min(1),
    fcurves: z.array(z.object({
        dataPath: z.string().min(1),
        arrayIndex: z.number().int().min(0).default(0),
        keyframes: z.array(z.object({ frame: z.number(), value: z.number() })),
    })),
});

// Defaults follow a freshly created camera or light of the source tool
export const CameraDataSchema = z.object({
    name: z.string().default('Camera'),
    type: z.string().default('PERSP'),
    angle: z.number().default(0.6911112070083618),
    clipStart: z.number().default(0.1),
    clipEnd: z.number().default(100),
    orthoScale: z.number().default(6),
    animation: AnimationSchema.optional(),
});

export const LightDataSchema = z.object({
    name: z.string().default('Light'),
    type: z.string(),
    energy: z.number().default(10),
    color: RGBSchema.default([1, 1, 1]),
    shadowColor: RGBSchema.default([0, 0, 0]),
    specularFactor: z.number().default(1),
    cutoffDistance: z.number().default(40),
    spotSize: z.number().default(Math.PI / 4),
    spotBlend: z.number().min(0).max(1).default(0.15),
    useShadow: z.boolean().default(true),
    renderEngine: z.object({ castShadow: z.boolean().default(true) }).default({}),
    animation: AnimationSchema.optional(),
});

const objectFields = {
    name: z.string().min(1),
    matrixLocal: MatrixSchema.default(IDENTITY_MATRIX),
    children: z.lazy(() => z.array(SourceObjectSchema).default([])),
};

export const SourceObjectSchema: z.ZodType<SourceObject, z.ZodTypeDef, unknown> = z.lazy(() => z.union([
    z.object({ ...objectFields, type: z.literal('EMPTY') }),
    z.object({ ...objectFields, type: z.literal('CAMERA'), data: CameraDataSchema.default({}) }),
    z.object({ ...objectFields, type: z.literal('LIGHT'), data: LightDataSchema }),
    z.object({ ...objectFields, type: z.enum(OTHER_OBJECT_TYPES) }),
]));

export const SourceSceneSchema = z.object({
    name: z.string().min(1),
    objects: z.array(SourceObjectSchema),
});

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
        .join('; ');
}

export function parseSourceScene(input: unknown): SourceScene {
    const parsed = SourceSceneSchema.safeParse(input);
    if (!parsed.success) {
        throw new ExportError('INVALID_SOURCE', `Invalid source scene: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Loads a JSON description of the source scene from disk
 */
export function loadSourceScene(filePath: string, logger: Logger): SourceScene {
    if (!existsSync(filePath)) {
        throw new ExportError('SOURCE_NOT_FOUND', `Source scene not found: ${filePath}`);
    }

    logger.debug(`Loading source scene: ${filePath}`);
    let json: unknown;
    try {
        json = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new ExportError('INVALID_SOURCE', `Source scene is not valid JSON: ${error}`);
    }
    return parseSourceScene(json);
}
