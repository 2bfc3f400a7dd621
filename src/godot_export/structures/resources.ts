import path from 'path';
import { formatValue } from './values.js';
import type { GodotValue } from './values.js';

/** An `[ext_resource]` entry: content linked from another file. */
export class ExternalResource {
    constructor(readonly path: string, readonly type: string) {}

    /** Path as written in the scene, relative to the directory of the exported file. */
    relativePath(exportPath: string): string {
        const exportDir = path.dirname(path.resolve(exportPath));
        return path.relative(exportDir, path.resolve(this.path)).replace(/\\/g, '/');
    }

    toString(id: number, exportPath: string): string {
        return `[ext_resource path=${JSON.stringify(this.relativePath(exportPath))} type=${JSON.stringify(this.type)} id=${id}]`;
    }
}

/** A `[sub_resource]` entry: a resource embedded in the scene file. */
export class InternalResource {
    private readonly attributes = new Map<string, GodotValue>();

    constructor(readonly type: string) {}

    set(attribute: string, value: GodotValue): void {
        this.attributes.set(attribute, value);
    }

    get(attribute: string): GodotValue | undefined {
        return this.attributes.get(attribute);
    }

    toString(id: number): string {
        const lines = [`[sub_resource type=${JSON.stringify(this.type)} id=${id}]`];
        for (const [attribute, value] of this.attributes) {
            lines.push(`${attribute} = ${formatValue(value)}`);
        }
        return lines.join('\n');
    }
}
