import type { ExportSettings } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { findScene } from '../utils/scene_finder.js';
import type { SceneDocument } from '../structures/scene_document.js';
import { ExternalResource } from '../structures/resources.js';
import { ExtResourceRef } from '../structures/values.js';

/**
 * Returns a reference to the linked scene `sceneName`, registering it with
 * the document the first time it is asked for. Null when no such scene
 * exists in the project.
 */
export function useExternalScene(
    document: SceneDocument,
    settings: ExportSettings,
    sceneName: string,
    logger: Logger,
): ExtResourceRef | null {
    const externalScene = findScene(settings, sceneName, logger);
    if (externalScene === null) {
        logger.warn(`Unable to find '${sceneName}' in project`);
        return null;
    }

    let resourceId = document.getExternalResource(sceneName);
    if (resourceId === null) {
        const resource = new ExternalResource(externalScene.path, externalScene.type);
        resourceId = document.addExternalResource(resource, sceneName);
        logger.debug(`Linked external scene ${sceneName} as resource ${resourceId}`);
    }
    return new ExtResourceRef(resourceId);
}
