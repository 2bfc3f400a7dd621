import type { LightData, LightObject } from '../types.js';
import type { Logger } from '../utils/logger.js';
import type { SceneDocument } from '../structures/scene_document.js';
import { NodeTemplate } from '../structures/node_template.js';
import { degrees, gammaCorrect, normalizeTransform } from '../structures/transform.js';
import { Transform } from '../structures/values.js';
import { applyAttributeTable, colorAttribute, scalarAttribute } from './attribute_conversion.js';
import type { AttributeTable } from './attribute_conversion.js';
import type { AnimationExporter } from './animation.js';
import type { ConversionResult, NodeConverter } from './conversion_result.js';

export type GodotLightType = 'OmniLight' | 'SpotLight' | 'DirectionalLight';

export const SOURCE_TO_GODOT_LIGHT: Readonly<Record<string, GodotLightType>> = {
    POINT: 'OmniLight',
    SPOT: 'SpotLight',
    SUN: 'DirectionalLight',
};

export const convertPointEnergy = (energy: number): number => Math.abs(energy / 100);
export const convertSunEnergy = (energy: number): number => Math.abs(energy);
export const convertSpotSize = (spotSize: number): number => degrees(spotSize / 2);
export const convertSpotBlend = (spotBlend: number): number => 0.2 / (spotBlend + 0.01);

const COMMON_LIGHT_ATTRIBUTES: AttributeTable<LightData> = [
    scalarAttribute('specularFactor', 'light_specular'),
    colorAttribute('color', 'light_color', gammaCorrect),
    colorAttribute('shadowColor', 'shadow_color', gammaCorrect),
];

const OMNI_ATTRIBUTES: AttributeTable<LightData> = [
    scalarAttribute('energy', 'light_energy', convertPointEnergy),
    scalarAttribute('cutoffDistance', 'omni_range'),
];

const SPOT_ATTRIBUTES: AttributeTable<LightData> = [
    scalarAttribute('energy', 'light_energy', convertPointEnergy),
    scalarAttribute('spotSize', 'spot_angle', convertSpotSize),
    scalarAttribute('spotBlend', 'spot_angle_attenuation', convertSpotBlend),
    scalarAttribute('cutoffDistance', 'spot_range'),
];

const DIRECTIONAL_ATTRIBUTES: AttributeTable<LightData> = [
    scalarAttribute('energy', 'light_energy', convertSunEnergy),
];

/** Common entries first, so kind entries win on a shared target attribute. */
export const LIGHT_ATTRIBUTES: Readonly<Record<GodotLightType, AttributeTable<LightData>>> = {
    OmniLight: [...COMMON_LIGHT_ATTRIBUTES, ...OMNI_ATTRIBUTES],
    SpotLight: [...COMMON_LIGHT_ATTRIBUTES, ...SPOT_ATTRIBUTES],
    DirectionalLight: [...COMMON_LIGHT_ATTRIBUTES, ...DIRECTIONAL_ATTRIBUTES],
};

export function godotLightType(light: LightData): GodotLightType | null {
    return Object.prototype.hasOwnProperty.call(SOURCE_TO_GODOT_LIGHT, light.type)
        ? SOURCE_TO_GODOT_LIGHT[light.type]
        : null;
}

export class LightNode extends NodeTemplate {
    readonly attributeConversion: AttributeTable<LightData>;

    constructor(name: string, readonly lightType: GodotLightType, parent: NodeTemplate | null) {
        super(name, lightType, parent);
        this.attributeConversion = LIGHT_ATTRIBUTES[lightType];
    }
}

/**
 * Exports point, spot and sun lights. Other light kinds are skipped with a
 * warning.
 */
export class LightNodeConverter implements NodeConverter<LightObject> {
    constructor(private logger: Logger, private animation: AnimationExporter) {}

    convert(document: SceneDocument, object: LightObject, parent: NodeTemplate): ConversionResult {
        const light = object.data;
        const lightType = godotLightType(light);

        let lightNode: LightNode | null = null;
        if (lightType !== null) {
            lightNode = new LightNode(object.name, lightType, parent);
            applyAttributeTable(lightNode, lightNode.attributeConversion, light);

            // Not in the tables: these are not exported as animation tracks
            lightNode.set('transform', new Transform(normalizeTransform(object.matrixLocal, lightType)));
            lightNode.set('light_negative', light.energy < 0);
            lightNode.set('shadow_enabled', light.useShadow && light.renderEngine.castShadow);

            document.addNode(lightNode);
            this.logger.debug(`Exported ${lightType} ${object.name}`);
        } else {
            this.logger.warn(`Unknown light type. Use Point, Spot or Sun: ${object.name}`);
        }

        this.animation.exportAnimationData(document, lightNode, light, 'light');

        return lightNode !== null ? { kind: 'node', node: lightNode } : { kind: 'none' };
    }
}
