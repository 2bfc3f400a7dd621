/**
 * Values that can be assigned to node and resource attributes, and their
 * text form in a Godot 3 scene file.
 */

import type { ReadonlyMat4 } from 'gl-matrix';

export class Color {
    constructor(
        readonly r: number,
        readonly g: number,
        readonly b: number,
        readonly a: number = 1,
    ) {}
}

export class NodePath {
    constructor(readonly path: string) {}
}

export class ExtResourceRef {
    readonly kind = 'ExtResource';

    constructor(readonly id: number) {}
}

export class SubResourceRef {
    readonly kind = 'SubResource';

    constructor(readonly id: number) {}
}

export class PoolRealArray {
    constructor(readonly values: readonly number[]) {}
}

/** A 4x4 affine transform in source (Z-up) space. */
export class Transform {
    constructor(readonly matrix: ReadonlyMat4) {}
}

export type GodotValue =
    | number
    | boolean
    | string
    | Color
    | NodePath
    | ExtResourceRef
    | SubResourceRef
    | PoolRealArray
    | Transform
    | readonly GodotValue[]
    | ReadonlyMap<string, GodotValue>;

export function formatNumber(value: number): string {
    // Round away float32 noise, and print -0 as 0
    return String(Number(value.toFixed(6)));
}

function matrixElement(matrix: ReadonlyMat4, row: number, col: number): number {
    return matrix[col * 4 + row];
}

/**
 * Converts a Z-up matrix to Godot's Y-up convention and returns it as rows.
 */
export function fixMatrix(matrix: ReadonlyMat4): number[][] {
    const rows: number[][] = [];
    for (let row = 0; row < 4; row++) {
        rows.push([0, 1, 2, 3].map(col => matrixElement(matrix, row, col)));
    }

    // swap the Y and Z rows, then the Y and Z columns
    [rows[1], rows[2]] = [rows[2], rows[1]];
    for (const row of rows) {
        [row[1], row[2]] = [row[2], row[1]];
    }

    rows[0][2] = -rows[0][2];
    rows[1][2] = -rows[1][2];
    rows[2][0] = -rows[2][0];
    rows[2][1] = -rows[2][1];
    rows[2][3] = -rows[2][3];

    return rows;
}

export function formatTransform(matrix: ReadonlyMat4): string {
    const rows = fixMatrix(matrix);
    const values: number[] = [];
    for (let row = 0; row < 3; row++) {
        for (let col = 0; col < 3; col++) {
            values.push(rows[row][col]);
        }
    }
    for (let axis = 0; axis < 3; axis++) {
        values.push(rows[axis][3]);
    }
    return `Transform( ${values.map(formatNumber).join(', ')} )`;
}

function isValueList(value: GodotValue): value is readonly GodotValue[] {
    return Array.isArray(value);
}

export function formatValue(value: GodotValue): string {
    if (typeof value === 'boolean') {
        return value ? 'true' : 'false';
    }
    if (typeof value === 'number') {
        return formatNumber(value);
    }
    if (typeof value === 'string') {
        return JSON.stringify(value);
    }
    if (value instanceof Color) {
        return `Color( ${[value.r, value.g, value.b, value.a].map(formatNumber).join(', ')} )`;
    }
    if (value instanceof NodePath) {
        return `NodePath(${JSON.stringify(value.path)})`;
    }
    if (value instanceof ExtResourceRef || value instanceof SubResourceRef) {
        return `${value.kind}( ${value.id} )`;
    }
    if (value instanceof PoolRealArray) {
        return `PoolRealArray( ${value.values.map(formatNumber).join(', ')} )`;
    }
    if (value instanceof Transform) {
        return formatTransform(value.matrix);
    }
    if (isValueList(value)) {
        return `[ ${value.map(formatValue).join(', ')} ]`;
    }
    const entries = [...value.entries()].map(([key, item]) => `${JSON.stringify(key)}: ${formatValue(item)}`);
    return `{\n${entries.join(',\n')}\n}`;
}
