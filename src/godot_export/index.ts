import type { ExportProgress, ExportSettings, SourceScene } from './types.js';
import { asExportError } from './errors.js';
import { Logger } from './utils/logger.js';
import { loadSourceScene } from './utils/source_loader.js';
import { SceneExporter } from './exporters/scene_exporter.js';

export class GodotExporter {
    private logger: Logger;
    private progress: ExportProgress;

    constructor(private settings: ExportSettings) {
        this.logger = new Logger(settings);
        this.progress = {
            total: 0,
            completed: 0,
            current: '',
            errors: [],
        };
    }

    /** Loads a source scene description and exports it. */
    async exportFile(sourcePath: string): Promise<void> {
        const scene = loadSourceScene(sourcePath, this.logger);
        await this.exportScene(scene);
    }

    async exportScene(scene: SourceScene): Promise<void> {
        this.progress.total += 1;
        this.progress.current = scene.name;
        try {
            this.logger.info('Starting Godot export...');
            await new SceneExporter(scene, this.settings, this.logger.child(scene.name)).export();
            this.progress.completed += 1;
            this.logger.progress(this.progress.completed, this.progress.total, `Exported ${scene.name}`);
        } catch (error) {
            const exportError = asExportError(error, 'EXPORT_FAILED', `Export of ${scene.name} failed`);
            this.progress.errors.push(`${scene.name}: ${exportError.code}: ${exportError.message}`);
            this.logger.error(`Export failed: ${exportError.message}`);
            throw exportError;
        }
    }

    getProgress(): ExportProgress {
        return { ...this.progress, errors: [...this.progress.errors] };
    }
}

export type {
    ExportSettings,
    SourceScene,
    SourceObject,
    CameraData,
    LightData,
    AnimationData,
    SearchPathMode,
} from './types.js';
export { getDefaultSettings, parseCliArgs, renderHelpText } from './config.js';
export { ExportError, isExportError, asExportError } from './errors.js';
export { Logger } from './utils/logger.js';
export { loadSourceScene, parseSourceScene } from './utils/source_loader.js';
export { findScene } from './utils/scene_finder.js';
export type { FoundScene } from './utils/scene_finder.js';
export { SceneDocument } from './structures/scene_document.js';
export { NodeTemplate, InstanceTemplate } from './structures/node_template.js';
export { ExternalResource, InternalResource } from './structures/resources.js';
export { fixDirectionalTransform, normalizeTransform, gammaCorrect } from './structures/transform.js';
export { useExternalScene } from './converters/external_scene.js';
export { EmptyNodeConverter } from './converters/empty_node.js';
export { CameraNodeConverter, CAMERA_ATTRIBUTES } from './converters/camera_node.js';
export { LightNodeConverter, LIGHT_ATTRIBUTES } from './converters/light_node.js';
export { ActionAnimationExporter } from './converters/animation.js';
export type { AnimationExporter, AnimationCategory } from './converters/animation.js';
export type { ConversionResult } from './converters/conversion_result.js';
export { SceneExporter } from './exporters/scene_exporter.js';
