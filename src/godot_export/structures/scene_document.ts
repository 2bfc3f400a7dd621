import { NodeTemplate } from './node_template.js';
import { ExternalResource, InternalResource } from './resources.js';

interface RegisteredResource<R> {
    id: number;
    resource: R;
}

/**
 * In-memory scene being exported: the nodes in the order they were added
 * and the external and internal resources they reference. Resources are
 * registered under a caller-chosen key so a second request for the same
 * key finds the first registration.
 */
export class SceneDocument {
    private readonly nodes: NodeTemplate[] = [];
    private readonly siblingNames = new Map<NodeTemplate | null, Set<string>>();
    private readonly externalResources: RegisteredResource<ExternalResource>[] = [];
    private readonly externalResourceIds = new Map<string, number>();
    private readonly internalResources: RegisteredResource<InternalResource>[] = [];
    private readonly internalResourceIds = new Map<string, number>();

    constructor(readonly exportPath: string) {}

    /**
     * Adds a node after the ones already added. A name already taken by a
     * sibling gets the first free numeric suffix, as Godot would on load.
     */
    addNode(node: NodeTemplate): void {
        let names = this.siblingNames.get(node.parent);
        if (names === undefined) {
            names = new Set();
            this.siblingNames.set(node.parent, names);
        }
        if (names.has(node.name)) {
            let suffix = 2;
            while (names.has(`${node.name}${suffix}`)) {
                suffix++;
            }
            node.name = `${node.name}${suffix}`;
        }
        names.add(node.name);
        this.nodes.push(node);
    }

    getNodes(): readonly NodeTemplate[] {
        return this.nodes;
    }

    getExternalResource(key: string): number | null {
        return this.externalResourceIds.get(key) ?? null;
    }

    /** Registers the resource and returns its id; ids start at 1. */
    addExternalResource(resource: ExternalResource, key: string): number {
        const id = this.externalResources.length + 1;
        this.externalResources.push({ id, resource });
        this.externalResourceIds.set(key, id);
        return id;
    }

    getExternalResources(): readonly ExternalResource[] {
        return this.externalResources.map(entry => entry.resource);
    }

    getInternalResource(key: string): number | null {
        return this.internalResourceIds.get(key) ?? null;
    }

    addInternalResource(resource: InternalResource, key: string): number {
        const id = this.internalResources.length + 1;
        this.internalResources.push({ id, resource });
        this.internalResourceIds.set(key, id);
        return id;
    }

    getInternalResources(): readonly InternalResource[] {
        return this.internalResources.map(entry => entry.resource);
    }

    toString(): string {
        const loadSteps = this.externalResources.length + this.internalResources.length + 1;
        const lines: string[] = [`[gd_scene load_steps=${loadSteps} format=2]`, ''];

        for (const { id, resource } of this.externalResources) {
            lines.push(resource.toString(id, this.exportPath));
        }
        if (this.externalResources.length > 0) {
            lines.push('');
        }

        for (const { id, resource } of this.internalResources) {
            lines.push(resource.toString(id));
            lines.push('');
        }

        for (const node of this.nodes) {
            lines.push(node.toString());
            lines.push('');
        }

        return lines.join('\n');
    }
}
