import type { CameraData, CameraObject } from '../types.js';
import type { Logger } from '../utils/logger.js';
import type { SceneDocument } from '../structures/scene_document.js';
import { NodeTemplate } from '../structures/node_template.js';
import { degrees, normalizeTransform } from '../structures/transform.js';
import { Transform } from '../structures/values.js';
import { applyAttributeTable, scalarAttribute } from './attribute_conversion.js';
import type { AttributeTable } from './attribute_conversion.js';
import type { AnimationExporter } from './animation.js';
import type { ConversionResult, NodeConverter } from './conversion_result.js';

export const CAMERA_ATTRIBUTES: AttributeTable<CameraData> = [
    scalarAttribute('clipEnd', 'far'),
    scalarAttribute('clipStart', 'near'),
    scalarAttribute('orthoScale', 'size'),
];

export const PERSPECTIVE = 0;
export const ORTHOGONAL = 1;

export class CameraNode extends NodeTemplate {
    readonly attributeConversion = CAMERA_ATTRIBUTES;

    constructor(name: string, parent: NodeTemplate | null) {
        super(name, 'Camera', parent);
    }
}

export function cameraProjection(camera: CameraData): number {
    return camera.type === 'PERSP' ? PERSPECTIVE : ORTHOGONAL;
}

export class CameraNodeConverter implements NodeConverter<CameraObject> {
    constructor(private logger: Logger, private animation: AnimationExporter) {}

    convert(document: SceneDocument, object: CameraObject, parent: NodeTemplate): ConversionResult {
        const camera = object.data;
        const cameraNode = new CameraNode(object.name, parent);

        applyAttributeTable(cameraNode, cameraNode.attributeConversion, camera);
        cameraNode.set('projection', cameraProjection(camera));

        // fov is kept out of the table: it is not exported as an animation track
        cameraNode.set('fov', degrees(camera.angle));

        cameraNode.set('transform', new Transform(normalizeTransform(object.matrixLocal, cameraNode.type)));
        document.addNode(cameraNode);
        this.logger.debug(`Exported camera ${object.name}`);

        this.animation.exportAnimationData(document, cameraNode, camera, 'camera');

        return { kind: 'node', node: cameraNode };
    }
}
