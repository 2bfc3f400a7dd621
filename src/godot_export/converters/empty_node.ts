import type { EmptyObject, ExportSettings, OtherObject } from '../types.js';
import type { Logger } from '../utils/logger.js';
import type { SceneDocument } from '../structures/scene_document.js';
import { InstanceTemplate, NodeTemplate } from '../structures/node_template.js';
import { Transform } from '../structures/values.js';
import { useExternalScene } from './external_scene.js';
import type { ConversionResult, NodeConverter } from './conversion_result.js';

// "crate.tscn", "crate.escn.001" -> the scene file it names
const SCENE_FILENAME = /^(.*\.[te]scn)/;

export function matchSceneFilename(name: string): string | null {
    const match = name.match(SCENE_FILENAME);
    return match ? match[1] : null;
}

/**
 * Converts an empty (or any object without a converter of its own) into a
 * Spatial, or into an instance of the linked scene its name points at.
 */
export class EmptyNodeConverter implements NodeConverter<EmptyObject | OtherObject> {
    constructor(private settings: ExportSettings, private logger: Logger) {}

    convert(document: SceneDocument, object: EmptyObject | OtherObject, parent: NodeTemplate): ConversionResult {
        if (!this.settings.objectTypes.has('EMPTY')) {
            return { kind: 'unchanged', parent };
        }

        const sceneName = matchSceneFilename(object.name);
        if (sceneName !== null) {
            const instance = useExternalScene(document, this.settings, sceneName, this.logger);
            if (instance !== null) {
                const instanceNode = new InstanceTemplate(object.name, instance, parent);
                instanceNode.set('transform', new Transform(object.matrixLocal));
                document.addNode(instanceNode);
                return { kind: 'node', node: instanceNode };
            }
        }

        const emptyNode = new NodeTemplate(object.name, 'Spatial', parent);
        emptyNode.set('transform', new Transform(object.matrixLocal));
        document.addNode(emptyNode);
        return { kind: 'node', node: emptyNode };
    }
}
