import type { RGB } from '../types.js';
import type { NodeTemplate } from '../structures/node_template.js';
import type { GodotValue } from '../structures/values.js';

export interface ScalarConvertInfo<S> {
    readonly kind: 'scalar';
    readonly sourceAttr: string;
    readonly targetAttr: string;
    readonly read: (source: S) => number;
    readonly convert: (value: number) => GodotValue;
}

export interface ColorConvertInfo<S> {
    readonly kind: 'color';
    readonly sourceAttr: string;
    readonly targetAttr: string;
    readonly read: (source: S) => RGB;
    readonly convert: (value: RGB) => GodotValue;
}

/**
 * One row of a conversion table: which source attribute feeds which Godot
 * attribute, and how the value is transformed on the way. `convert` is also
 * called for every sampled keyframe when the attribute is animated, so it
 * must depend on its argument only.
 */
export type AttributeConvertInfo<S> = ScalarConvertInfo<S> | ColorConvertInfo<S>;

export type AttributeTable<S> = readonly AttributeConvertInfo<S>[];

export const identity = (value: number): number => value;

/**
 * Table row for a numeric attribute. The row only fits a table over source
 * types that have a numeric `sourceAttr` field.
 */
export function scalarAttribute<K extends string>(
    sourceAttr: K,
    targetAttr: string,
    convert: (value: number) => GodotValue = identity,
): ScalarConvertInfo<Record<K, number>> {
    return { kind: 'scalar', sourceAttr, targetAttr, read: source => source[sourceAttr], convert };
}

export function colorAttribute<K extends string>(
    sourceAttr: K,
    targetAttr: string,
    convert: (value: RGB) => GodotValue,
): ColorConvertInfo<Record<K, RGB>> {
    return { kind: 'color', sourceAttr, targetAttr, read: source => source[sourceAttr], convert };
}

export function applyConversion<S>(entry: AttributeConvertInfo<S>, source: S): [string, GodotValue] {
    if (entry.kind === 'scalar') {
        return [entry.targetAttr, entry.convert(entry.read(source))];
    }
    return [entry.targetAttr, entry.convert(entry.read(source))];
}

export function applyAttributeTable<S>(node: NodeTemplate, table: AttributeTable<S>, source: S): void {
    for (const entry of table) {
        const [attribute, value] = applyConversion(entry, source);
        node.set(attribute, value);
    }
}
