import { existsSync, mkdirSync } from 'fs';
import path from 'path';
import type { ExportSettings, SearchPathMode, SourceObjectType } from './types.js';
import { OTHER_OBJECT_TYPES } from './types.js';

export const DEFAULT_OBJECT_TYPES: readonly SourceObjectType[] = ['EMPTY', 'CAMERA', 'LIGHT'];
const SEARCH_PATH_MODES: readonly SearchPathMode[] = ['PROJECT_DIR', 'EXPORT_DIR', 'NONE'];
const KNOWN_OBJECT_TYPES: readonly SourceObjectType[] = [...DEFAULT_OBJECT_TYPES, ...OTHER_OBJECT_TYPES];

/**
 * Walks up from `startDir` to the first directory holding a project.godot.
 */
export function findProjectDir(startDir: string): string | null {
    let dir = path.resolve(startDir);
    for (;;) {
        if (existsSync(path.join(dir, 'project.godot'))) {
            return dir;
        }
        const parent = path.dirname(dir);
        if (parent === dir) {
            return null;
        }
        dir = parent;
    }
}

export function getDefaultSettings(exportPath: string): ExportSettings {
    const resolvedPath = path.resolve(exportPath);
    return {
        path: resolvedPath,
        objectTypes: new Set(DEFAULT_OBJECT_TYPES),
        materialSearchPaths: 'PROJECT_DIR',
        projectPathFunc: () => findProjectDir(path.dirname(resolvedPath)),
        fps: 24,
        frameStart: 1,
        verbose: false,
    };
}

export function ensureOutputDir(exportPath: string): void {
    const dir = path.dirname(path.resolve(exportPath));
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
    }
}

export interface CliOptions {
    sourcePath: string;
    settings: ExportSettings;
}

export interface ParsedCliArgs {
    options: CliOptions | null;
    error?: string;
}

export function renderHelpText(): string {
    return [
        'Usage: godot-scene-export <source.json> --out <scene.escn> [options]',
        '',
        'Options:',
        '  --out <file>               scene file to write (.escn or .tscn)',
        '  --search <mode>            where linked scenes are looked up: PROJECT_DIR, EXPORT_DIR or NONE',
        '  --object-types <list>      comma separated object types to export (default EMPTY,CAMERA,LIGHT)',
        '  --fps <n>                  frames per second of the source animation (default 24)',
        '  --frame-start <n>          first frame of the source animation (default 1)',
        '  --verbose                  print debug output',
        '  --help                     show this text',
    ].join('\n');
}

function isSearchPathMode(value: string): value is SearchPathMode {
    return SEARCH_PATH_MODES.some(mode => mode === value);
}

function isObjectType(value: string): value is SourceObjectType {
    return KNOWN_OBJECT_TYPES.some(type => type === value);
}

export function parseCliArgs(argv: string[]): ParsedCliArgs {
    let sourcePath: string | null = null;
    let outPath: string | null = null;
    let search: SearchPathMode | null = null;
    let objectTypes: SourceObjectType[] | null = null;
    let fps: number | null = null;
    let frameStart: number | null = null;
    let verbose = false;

    for (let index = 0; index < argv.length; index += 1) {
        const arg = argv[index];
        const value = argv[index + 1];

        if (arg === '--help' || arg === '-h') {
            return { options: null, error: 'help' };
        }
        if (arg === '--verbose') {
            verbose = true;
            continue;
        }
        if (arg === '--out') {
            if (!value) return { options: null, error: '--out requires a value.' };
            outPath = value;
            index += 1;
            continue;
        }
        if (arg === '--search') {
            if (!value || !isSearchPathMode(value)) {
                return { options: null, error: `Invalid --search value "${value ?? ''}".` };
            }
            search = value;
            index += 1;
            continue;
        }
        if (arg === '--object-types') {
            if (!value) return { options: null, error: '--object-types requires a value.' };
            const types = value.split(',').map(type => type.trim().toUpperCase()).filter(type => type.length > 0);
            const unknown = types.filter(type => !isObjectType(type));
            if (unknown.length > 0) {
                return { options: null, error: `Unknown object types: ${unknown.join(', ')}.` };
            }
            objectTypes = types.filter(isObjectType);
            index += 1;
            continue;
        }
        if (arg === '--fps' || arg === '--frame-start') {
            const parsed = Number(value);
            if (!value || !Number.isFinite(parsed) || (arg === '--fps' && parsed <= 0)) {
                return { options: null, error: `Invalid ${arg} value "${value ?? ''}".` };
            }
            if (arg === '--fps') fps = parsed;
            else frameStart = parsed;
            index += 1;
            continue;
        }
        if (arg.startsWith('-')) {
            return { options: null, error: `Unknown option "${arg}".` };
        }
        if (sourcePath !== null) {
            return { options: null, error: `Unexpected argument "${arg}".` };
        }
        sourcePath = arg;
    }

    if (sourcePath === null) {
        return { options: null, error: 'A source scene file is required.' };
    }
    if (outPath === null) {
        return { options: null, error: '--out is required.' };
    }

    const settings = getDefaultSettings(outPath);
    settings.verbose = verbose;
    if (search !== null) settings.materialSearchPaths = search;
    if (objectTypes !== null) settings.objectTypes = new Set(objectTypes);
    if (fps !== null) settings.fps = fps;
    if (frameStart !== null) settings.frameStart = frameStart;

    return { options: { sourcePath: path.resolve(sourcePath), settings } };
}
