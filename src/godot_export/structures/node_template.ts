import { formatValue } from './values.js';
import type { ExtResourceRef, GodotValue } from './values.js';

/**
 * A `[node]` entry of a scene file: a name, a Godot type, a parent and an
 * ordered set of attributes. Setting an attribute twice keeps the last value.
 * The name may change once when the node is added to a document.
 */
export class NodeTemplate {
    private readonly attributes = new Map<string, GodotValue>();

    constructor(
        public name: string,
        readonly type: string | null,
        readonly parent: NodeTemplate | null,
    ) {}

    set(attribute: string, value: GodotValue): void {
        this.attributes.set(attribute, value);
    }

    get(attribute: string): GodotValue | undefined {
        return this.attributes.get(attribute);
    }

    has(attribute: string): boolean {
        return this.attributes.has(attribute);
    }

    attributeNames(): string[] {
        return [...this.attributes.keys()];
    }

    /** Path of this node as written in a child's `parent` field. */
    getPath(): string {
        if (this.parent === null) {
            return '.';
        }
        const parentPath = this.parent.getPath();
        if (parentPath === '.') {
            return this.name;
        }
        return `${parentPath}/${this.name}`;
    }

    protected headingFields(): string[] {
        const fields = [`name=${JSON.stringify(this.name)}`];
        if (this.type !== null) {
            fields.push(`type=${JSON.stringify(this.type)}`);
        }
        if (this.parent !== null) {
            fields.push(`parent=${JSON.stringify(this.parent.getPath())}`);
        }
        return fields;
    }

    toString(): string {
        const lines = [`[node ${this.headingFields().join(' ')}]`];
        for (const [attribute, value] of this.attributes) {
            lines.push(`${attribute} = ${formatValue(value)}`);
        }
        return lines.join('\n');
    }
}

/** A node that instances an external scene instead of naming a type. */
export class InstanceTemplate extends NodeTemplate {
    constructor(name: string, readonly instance: ExtResourceRef, parent: NodeTemplate | null) {
        super(name, null, parent);
    }

    protected headingFields(): string[] {
        return [...super.headingFields(), `instance=${formatValue(this.instance)}`];
    }
}
