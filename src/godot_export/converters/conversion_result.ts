import type { SourceObject } from '../types.js';
import type { SceneDocument } from '../structures/scene_document.js';
import type { NodeTemplate } from '../structures/node_template.js';

/**
 * Outcome of converting one source object:
 * - `node`: a new node was added to the document
 * - `unchanged`: the object was filtered out and its children belong to `parent`
 * - `none`: the object could not be converted
 */
export type ConversionResult =
    | { kind: 'node'; node: NodeTemplate }
    | { kind: 'unchanged'; parent: NodeTemplate }
    | { kind: 'none' };

export interface NodeConverter<O extends SourceObject> {
    convert(document: SceneDocument, object: O, parent: NodeTemplate): ConversionResult;
}

/** The node that children of the converted object should be attached to. */
export function attachmentPoint(result: ConversionResult, parent: NodeTemplate): NodeTemplate {
    switch (result.kind) {
        case 'node':
            return result.node;
        case 'unchanged':
            return result.parent;
        case 'none':
            return parent;
    }
}
