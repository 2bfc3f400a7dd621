import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { mat4 } from 'gl-matrix';
import { vi } from 'vitest';
import { Logger } from '../utils/logger.js';
import type {
    CameraData,
    CameraObject,
    EmptyObject,
    ExportSettings,
    LightData,
    LightObject,
    SourceObjectType,
} from '../types.js';

export const SCENE_HEADER = '[gd_scene load_steps=1 format=2]';

export function makeSettings(overrides: Partial<ExportSettings> = {}): ExportSettings {
    return {
        path: '/tmp/godot-scene-export/level.escn',
        objectTypes: new Set<SourceObjectType>(['EMPTY', 'CAMERA', 'LIGHT']),
        materialSearchPaths: 'NONE',
        projectPathFunc: () => null,
        fps: 24,
        frameStart: 1,
        verbose: false,
        ...overrides,
    };
}

/** A logger whose output is swallowed; its methods are spies. */
export function makeLogger(): Logger {
    const logger = new Logger({ verbose: false });
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    vi.spyOn(logger, 'error').mockImplementation(() => {});
    vi.spyOn(logger, 'debug').mockImplementation(() => {});
    vi.spyOn(logger, 'progress').mockImplementation(() => {});
    return logger;
}

export function makeLight(overrides: Partial<LightData> = {}): LightData {
    return {
        name: 'Light',
        type: 'POINT',
        energy: 1000,
        color: [1, 1, 1],
        shadowColor: [0, 0, 0],
        specularFactor: 1,
        cutoffDistance: 40,
        spotSize: Math.PI / 4,
        spotBlend: 0.15,
        useShadow: true,
        renderEngine: { castShadow: true },
        ...overrides,
    };
}

export function makeCamera(overrides: Partial<CameraData> = {}): CameraData {
    return {
        name: 'Camera',
        type: 'PERSP',
        angle: Math.PI / 2,
        clipStart: 0.1,
        clipEnd: 100,
        orthoScale: 6,
        ...overrides,
    };
}

export function lightObject(name: string, data: LightData, matrixLocal = mat4.create()): LightObject {
    return { name, type: 'LIGHT', matrixLocal, children: [], data };
}

export function cameraObject(name: string, data: CameraData, matrixLocal = mat4.create()): CameraObject {
    return { name, type: 'CAMERA', matrixLocal, children: [], data };
}

export function emptyObject(name: string, matrixLocal = mat4.create()): EmptyObject {
    return { name, type: 'EMPTY', matrixLocal, children: [] };
}

export function makeTempDir(): string {
    return mkdtempSync(path.join(os.tmpdir(), 'godot-scene-export-'));
}

export function removeTempDir(dir: string): void {
    rmSync(dir, { recursive: true, force: true });
}

export function writeFile(root: string, relativePath: string, content: string): string {
    const filePath = path.join(root, relativePath);
    mkdirSync(path.dirname(filePath), { recursive: true });
    writeFileSync(filePath, content);
    return filePath;
}
