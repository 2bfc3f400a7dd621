import type { AnimatedData, AnimationData, ExportSettings, FCurve, Keyframe, RGB } from '../types.js';
import type { Logger } from '../utils/logger.js';
import type { SceneDocument } from '../structures/scene_document.js';
import { NodeTemplate } from '../structures/node_template.js';
import { InternalResource } from '../structures/resources.js';
import { NodePath, PoolRealArray, SubResourceRef, formatValue } from '../structures/values.js';
import type { GodotValue } from '../structures/values.js';
import type { AttributeConvertInfo, AttributeTable } from './attribute_conversion.js';

export type AnimationCategory = 'camera' | 'light';

/** A node whose attributes come from a conversion table over `S`. */
export interface ConvertibleNode<S> extends NodeTemplate {
    readonly attributeConversion: AttributeTable<S>;
}

export interface AnimationExporter {
    /** Writes the animated attributes of `data` onto `node`. A null node is ignored. */
    exportAnimationData<S extends AnimatedData>(
        document: SceneDocument,
        node: ConvertibleNode<S> | null,
        data: S,
        category: AnimationCategory,
    ): void;
}

export interface ValueTrack {
    targetAttr: string;
    frames: number[];
    values: GodotValue[];
}

export function sortKeyframes(keyframes: readonly Keyframe[]): Keyframe[] {
    return [...keyframes].sort((a, b) => a.frame - b.frame);
}

/**
 * Value of a curve at `frame`: linear between keys, held flat before the
 * first key and after the last. `keys` must be sorted by frame.
 */
export function evaluateCurve(keys: readonly Keyframe[], frame: number): number {
    if (keys.length === 0) {
        throw new Error('Cannot evaluate a curve without keyframes');
    }
    if (frame <= keys[0].frame) {
        return keys[0].value;
    }
    const last = keys[keys.length - 1];
    if (frame >= last.frame) {
        return last.value;
    }
    for (let i = 1; i < keys.length; i++) {
        const next = keys[i];
        if (frame <= next.frame) {
            const prev = keys[i - 1];
            const t = (frame - prev.frame) / (next.frame - prev.frame);
            return prev.value + (next.value - prev.value) * t;
        }
    }
    return last.value;
}

function keyframeTimes(curves: readonly FCurve[]): number[] {
    const frames = new Set<number>();
    for (const curve of curves) {
        for (const key of curve.keyframes) {
            frames.add(key.frame);
        }
    }
    return [...frames].sort((a, b) => a - b);
}

/**
 * Samples one table entry at every keyframe of the curves animating its
 * source attribute, converting each sample the way the static export does.
 */
export function sampleAttribute<S>(
    entry: AttributeConvertInfo<S>,
    data: S,
    animation: AnimationData,
): ValueTrack | null {
    const curves = animation.fcurves
        .filter(curve => curve.dataPath === entry.sourceAttr && curve.keyframes.length > 0)
        .map(curve => ({ ...curve, keyframes: sortKeyframes(curve.keyframes) }));
    if (curves.length === 0) {
        return null;
    }

    const frames = keyframeTimes(curves);
    const values = frames.map(frame => {
        if (entry.kind === 'scalar') {
            return entry.convert(evaluateCurve(curves[0].keyframes, frame));
        }
        const channels = [...entry.read(data)];
        for (const curve of curves) {
            if (curve.arrayIndex >= 0 && curve.arrayIndex < channels.length) {
                channels[curve.arrayIndex] = evaluateCurve(curve.keyframes, frame);
            }
        }
        const color: RGB = [channels[0], channels[1], channels[2]];
        return entry.convert(color);
    });

    return { targetAttr: entry.targetAttr, frames, values };
}

function trackSignature(track: ValueTrack): string {
    return `${track.targetAttr}|${track.frames.join(',')}|${track.values.map(formatValue).join(',')}`;
}

/** Identifies an animation by its content, not by the names it came with. */
export function animationResourceKey(
    category: AnimationCategory,
    nodeType: string | null,
    action: string,
    tracks: readonly ValueTrack[],
): string {
    return [category, nodeType ?? '', action, ...tracks.map(trackSignature)].join('\n');
}

/**
 * Exports animated camera and light attributes as value tracks of an
 * Animation resource played by an AnimationPlayer under the animated node.
 */
export class ActionAnimationExporter implements AnimationExporter {
    constructor(private settings: ExportSettings, private logger: Logger) {}

    exportAnimationData<S extends AnimatedData>(
        document: SceneDocument,
        node: ConvertibleNode<S> | null,
        data: S,
        category: AnimationCategory,
    ): void {
        if (node === null) {
            return;
        }
        const animation = data.animation;
        if (animation === undefined || animation.fcurves.length === 0) {
            return;
        }

        const tracks: ValueTrack[] = [];
        for (const entry of node.attributeConversion) {
            const track = sampleAttribute(entry, data, animation);
            if (track !== null) {
                tracks.push(track);
            }
        }
        if (tracks.length === 0) {
            this.logger.debug(`No exportable ${category} curves in action ${animation.action} for ${node.name}`);
            return;
        }

        // Track paths are relative to the player, so nodes of one type whose
        // action produces the same tracks can share one resource
        const resourceKey = animationResourceKey(category, node.type, animation.action, tracks);
        let resourceId = document.getInternalResource(resourceKey);
        if (resourceId === null) {
            resourceId = document.addInternalResource(this.buildAnimation(animation.action, tracks), resourceKey);
        }

        const player = new NodeTemplate('AnimationPlayer', 'AnimationPlayer', node);
        player.set('root_node', new NodePath('..'));
        player.set(`anims/${animation.action}`, new SubResourceRef(resourceId));
        document.addNode(player);

        this.logger.debug(`Exported ${tracks.length} ${category} tracks for ${node.name}`);
    }

    private frameToTime(frame: number): number {
        return (frame - this.settings.frameStart) / this.settings.fps;
    }

    private buildAnimation(name: string, tracks: ValueTrack[]): InternalResource {
        const step = 1 / this.settings.fps;
        let length = step;
        for (const track of tracks) {
            length = Math.max(length, this.frameToTime(track.frames[track.frames.length - 1]));
        }

        const resource = new InternalResource('Animation');
        resource.set('resource_name', name);
        resource.set('length', length);
        resource.set('loop', false);
        resource.set('step', step);

        tracks.forEach((track, index) => {
            const prefix = `tracks/${index}`;
            resource.set(`${prefix}/type`, 'value');
            resource.set(`${prefix}/path`, new NodePath(`.:${track.targetAttr}`));
            resource.set(`${prefix}/interp`, 1);
            resource.set(`${prefix}/loop_wrap`, true);
            resource.set(`${prefix}/imported`, false);
            resource.set(`${prefix}/enabled`, true);
            resource.set(`${prefix}/keys`, new Map<string, GodotValue>([
                ['times', new PoolRealArray(track.frames.map(frame => this.frameToTime(frame)))],
                ['transitions', new PoolRealArray(track.frames.map(() => 1))],
                ['update', 0],
                ['values', track.values],
            ]));
        });

        return resource;
    }
}
