import { closeSync, existsSync, openSync, readSync, readdirSync, statSync } from 'fs';
import type { Dirent } from 'fs';
import path from 'path';
import type { ExportSettings } from '../types.js';
import type { Logger } from './logger.js';

export interface FoundScene {
    path: string;
    type: 'PackedScene';
}

const SCENE_HEADER_MARKER = 'gd_scene';
const HEADER_CHUNK_SIZE = 256;

/**
 * Picks the directory linked scenes are searched in, or null when the
 * search is disabled.
 */
export function getSearchRoot(settings: ExportSettings): string | null {
    switch (settings.materialSearchPaths) {
        case 'PROJECT_DIR':
            return settings.projectPathFunc();
        case 'EXPORT_DIR':
            return path.dirname(path.resolve(settings.path));
        default:
            return null;
    }
}

/**
 * Reads the first line of a file without loading the rest of it
 */
export function readFirstLine(filePath: string): string {
    const fd = openSync(filePath, 'r');
    try {
        const chunks: Buffer[] = [];
        const chunk = Buffer.alloc(HEADER_CHUNK_SIZE);
        let position = 0;
        for (;;) {
            const bytesRead = readSync(fd, chunk, 0, HEADER_CHUNK_SIZE, position);
            if (bytesRead === 0) break;
            const data = chunk.subarray(0, bytesRead);
            const newline = data.indexOf(0x0a);
            if (newline >= 0) {
                chunks.push(Buffer.from(data.subarray(0, newline)));
                break;
            }
            chunks.push(Buffer.from(data));
            position += bytesRead;
        }
        return Buffer.concat(chunks).toString('utf-8').replace(/\r$/, '');
    } finally {
        closeSync(fd);
    }
}

function isLinkToFile(linkPath: string): boolean {
    try {
        return statSync(linkPath).isFile();
    } catch {
        return false;
    }
}

// Symlinked files count as candidates; symlinked directories are not entered
function collectCandidates(dir: string, filename: string, candidates: string[], logger: Logger): void {
    let entries: Dirent[];
    try {
        entries = readdirSync(dir, { withFileTypes: true });
    } catch (error) {
        logger.warn(`Could not list directory ${dir}: ${error}`);
        return;
    }

    for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            collectCandidates(fullPath, filename, candidates, logger);
        } else if (entry.name === filename && (entry.isFile() || (entry.isSymbolicLink() && isLinkToFile(fullPath)))) {
            candidates.push(fullPath);
        }
    }
}

/**
 * Walks `folder` for files named exactly `filename` whose header marks them
 * as Godot scenes. When several qualify, warns and returns the one with the
 * lexicographically smallest path.
 */
export function findSceneInSubtree(folder: string, filename: string, logger: Logger): FoundScene | null {
    const candidates: string[] = [];
    collectCandidates(folder, filename, candidates, logger);

    const valid: FoundScene[] = [];
    for (const candidate of candidates) {
        let firstLine: string;
        try {
            firstLine = readFirstLine(candidate);
        } catch (error) {
            logger.warn(`Could not read candidate scene ${candidate}: ${error}`);
            continue;
        }
        if (firstLine.includes(SCENE_HEADER_MARKER)) {
            valid.push({ path: candidate, type: 'PackedScene' });
        } else {
            logger.debug(`Skipping ${candidate}: not a Godot scene`);
        }
    }

    if (valid.length === 0) {
        return null;
    }
    if (valid.length > 1) {
        logger.warn(`Multiple scenes found for ${filename} (${valid.length} candidates)`);
        valid.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    }
    return valid[0];
}

/**
 * Searches for an existing Godot scene named `filename` under the configured
 * search root. Returns null when the search is disabled, the root does not
 * exist or nothing matches.
 */
export function findScene(settings: ExportSettings, filename: string, logger: Logger): FoundScene | null {
    const searchRoot = getSearchRoot(settings);
    if (searchRoot === null) {
        logger.debug(`Scene search disabled, not looking for ${filename}`);
        return null;
    }
    if (!existsSync(searchRoot) || !statSync(searchRoot).isDirectory()) {
        logger.debug(`Scene search root not found: ${searchRoot}`);
        return null;
    }
    return findSceneInSubtree(searchRoot, filename, logger);
}
