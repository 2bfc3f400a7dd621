import { writeFileSync } from 'fs';
import type { BaseExporter, ExportSettings, SourceObject, SourceScene } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { ensureOutputDir } from '../config.js';
import { ExportError } from '../errors.js';
import { SceneDocument } from '../structures/scene_document.js';
import { NodeTemplate } from '../structures/node_template.js';
import { ActionAnimationExporter } from '../converters/animation.js';
import type { AnimationExporter } from '../converters/animation.js';
import { EmptyNodeConverter } from '../converters/empty_node.js';
import { CameraNodeConverter } from '../converters/camera_node.js';
import { LightNodeConverter } from '../converters/light_node.js';
import { attachmentPoint } from '../converters/conversion_result.js';
import type { ConversionResult } from '../converters/conversion_result.js';

export interface SceneExportStats {
    objects: number;
    nodes: number;
    skipped: number;
}

export class SceneExporter implements BaseExporter {
    private emptyConverter: EmptyNodeConverter;
    private cameraConverter: CameraNodeConverter;
    private lightConverter: LightNodeConverter;
    private stats: SceneExportStats = { objects: 0, nodes: 0, skipped: 0 };

    constructor(
        private scene: SourceScene,
        private settings: ExportSettings,
        private logger: Logger,
        animation: AnimationExporter = new ActionAnimationExporter(settings, logger),
    ) {
        this.emptyConverter = new EmptyNodeConverter(settings, logger);
        this.cameraConverter = new CameraNodeConverter(logger, animation);
        this.lightConverter = new LightNodeConverter(logger, animation);
    }

    async export(): Promise<void> {
        this.logger.info(`Exporting scene ${this.scene.name} to ${this.settings.path}...`);

        const document = this.buildDocument();
        try {
            ensureOutputDir(this.settings.path);
            writeFileSync(this.settings.path, document.toString());
        } catch (error) {
            throw new ExportError('WRITE_FAILED', `Failed to write ${this.settings.path}: ${error}`);
        }

        this.logger.info(
            `✓ Exported ${this.scene.name}: ${this.stats.nodes} nodes from ${this.stats.objects} objects` +
            (this.stats.skipped > 0 ? ` (${this.stats.skipped} skipped)` : ''),
        );
    }

    /**
     * Converts the whole source scene into a document under a Spatial root
     * named after the scene.
     */
    buildDocument(): SceneDocument {
        this.stats = { objects: 0, nodes: 0, skipped: 0 };
        const document = new SceneDocument(this.settings.path);
        const root = new NodeTemplate(this.scene.name, 'Spatial', null);
        document.addNode(root);

        for (const object of this.scene.objects) {
            this.exportObject(document, object, root);
        }
        return document;
    }

    getStats(): SceneExportStats {
        return { ...this.stats };
    }

    private exportObject(document: SceneDocument, object: SourceObject, parent: NodeTemplate): void {
        this.stats.objects++;
        const result = this.convertObject(document, object, parent);
        if (result.kind === 'node') {
            this.stats.nodes++;
        } else {
            this.stats.skipped++;
            this.logger.debug(`No node exported for ${object.type} ${object.name}`);
        }

        const childParent = attachmentPoint(result, parent);
        for (const child of object.children) {
            this.exportObject(document, child, childParent);
        }
    }

    private convertObject(document: SceneDocument, object: SourceObject, parent: NodeTemplate): ConversionResult {
        switch (object.type) {
            case 'CAMERA':
                if (!this.settings.objectTypes.has('CAMERA')) {
                    return { kind: 'unchanged', parent };
                }
                return this.cameraConverter.convert(document, object, parent);
            case 'LIGHT':
                if (!this.settings.objectTypes.has('LIGHT')) {
                    return { kind: 'unchanged', parent };
                }
                return this.lightConverter.convert(document, object, parent);
            default:
                return this.emptyConverter.convert(document, object, parent);
        }
    }
}
