import { mat4 } from 'gl-matrix';
import type { ReadonlyMat4 } from 'gl-matrix';
import type { RGB } from '../types.js';
import { Color } from './values.js';

// Godot node types whose meaning depends on the axis they face
const FORWARD_EMITTING_TYPES: ReadonlySet<string> = new Set([
    'Camera',
    'DirectionalLight',
    'SpotLight',
    'OmniLight',
]);

const DIRECTIONAL_CORRECTION = mat4.fromXRotation(mat4.create(), -Math.PI / 2);

/**
 * The up-axis swap applied on output also swaps local axes, which would
 * leave cameras and lights facing local -Y. Turning them -90 degrees about
 * local X first keeps them facing -Z as Godot expects.
 */
export function fixDirectionalTransform(matrix: ReadonlyMat4): mat4 {
    return mat4.multiply(mat4.create(), matrix, DIRECTIONAL_CORRECTION);
}

export function isForwardEmitting(nodeType: string | null): boolean {
    return nodeType !== null && FORWARD_EMITTING_TYPES.has(nodeType);
}

/** Returns a corrected copy for forward-emitting node types, an unchanged copy otherwise. */
export function normalizeTransform(matrix: ReadonlyMat4, nodeType: string | null): mat4 {
    if (isForwardEmitting(nodeType)) {
        return fixDirectionalTransform(matrix);
    }
    return mat4.clone(matrix);
}

export function degrees(radians: number): number {
    return radians * 180 / Math.PI;
}

function gammaCorrectChannel(value: number): number {
    // sRGB approximated with gamma 2.2
    return Math.pow(value, 1 / 2.2);
}

export function gammaCorrect(color: RGB): Color {
    return new Color(
        gammaCorrectChannel(color[0]),
        gammaCorrectChannel(color[1]),
        gammaCorrectChannel(color[2]),
    );
}
