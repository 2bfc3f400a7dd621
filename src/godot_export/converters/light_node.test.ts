import { describe, it, expect, vi } from 'vitest';
import { mat4 } from 'gl-matrix';
import { SceneDocument } from '../structures/scene_document.js';
import { NodeTemplate } from '../structures/node_template.js';
import { fixDirectionalTransform } from '../structures/transform.js';
import { Color, Transform } from '../structures/values.js';
import { lightObject, makeLight, makeLogger, makeSettings } from '../__tests__/fixtures.js';
import { ActionAnimationExporter } from './animation.js';
import {
    LIGHT_ATTRIBUTES,
    LightNode,
    LightNodeConverter,
    convertPointEnergy,
    convertSpotBlend,
    convertSpotSize,
    convertSunEnergy,
    godotLightType,
} from './light_node.js';

function setup() {
    const logger = makeLogger();
    const animation = { exportAnimationData: vi.fn() };
    const converter = new LightNodeConverter(logger, animation);
    const document = new SceneDocument('/project/level.escn');
    const root = new NodeTemplate('Level', 'Spatial', null);
    return { logger, animation, converter, document, root };
}

describe('light energy conversion', () => {
    it('scales omni and spot energy by 1/100 and drops the sign', () => {
        expect(convertPointEnergy(-250)).toBe(2.5);
        expect(convertPointEnergy(250)).toBe(2.5);
    });

    it('keeps directional energy magnitude and drops the sign', () => {
        expect(convertSunEnergy(-3.5)).toBe(3.5);
        expect(convertSunEnergy(3.5)).toBe(3.5);
    });

    it('returns the same result when applied again to the same input', () => {
        for (const energy of [-250, 0, 12.5, 1000]) {
            expect(convertPointEnergy(energy)).toBe(convertPointEnergy(energy));
            expect(convertSunEnergy(energy)).toBe(convertSunEnergy(energy));
        }
    });
});

describe('spot conversion', () => {
    it('halves the cone angle and converts it to degrees', () => {
        expect(convertSpotSize(Math.PI / 2)).toBeCloseTo(45, 10);
    });

    it('maps blend 0 to 20 and blend 1 to 0.2 / 1.01', () => {
        expect(convertSpotBlend(0)).toBeCloseTo(20, 10);
        expect(convertSpotBlend(1)).toBeCloseTo(0.198019801980198, 12);
    });

    it('decreases as the blend grows', () => {
        let previous = convertSpotBlend(0);
        for (const blend of [0.1, 0.25, 0.5, 0.75, 1]) {
            const current = convertSpotBlend(blend);
            expect(current).toBeLessThan(previous);
            previous = current;
        }
    });
});

describe('light tables', () => {
    it('maps source light kinds to Godot types', () => {
        expect(godotLightType(makeLight({ type: 'POINT' }))).toBe('OmniLight');
        expect(godotLightType(makeLight({ type: 'SPOT' }))).toBe('SpotLight');
        expect(godotLightType(makeLight({ type: 'SUN' }))).toBe('DirectionalLight');
        expect(godotLightType(makeLight({ type: 'AREA' }))).toBeNull();
        expect(godotLightType(makeLight({ type: 'toString' }))).toBeNull();
    });

    it('puts the common entries before the kind entries', () => {
        expect(LIGHT_ATTRIBUTES.DirectionalLight.map(entry => entry.targetAttr)).toEqual([
            'light_specular', 'light_color', 'shadow_color', 'light_energy',
        ]);
        expect(LIGHT_ATTRIBUTES.OmniLight.map(entry => entry.targetAttr)).toEqual([
            'light_specular', 'light_color', 'shadow_color', 'light_energy', 'omni_range',
        ]);
    });
});

describe('LightNodeConverter', () => {
    it('exports a spot light', () => {
        const { converter, document, root } = setup();
        const light = makeLight({ type: 'SPOT', energy: 1000, spotSize: Math.PI / 4, spotBlend: 0 });

        const result = converter.convert(document, lightObject('Spot', light), root);

        expect(result.kind).toBe('node');
        const node = result.kind === 'node' ? result.node : null;
        expect(node).toBeInstanceOf(LightNode);
        expect(node?.type).toBe('SpotLight');
        expect(node?.get('light_energy')).toBe(10);
        expect(node?.get('spot_angle')).toBeCloseTo(22.5, 10);
        expect(node?.get('spot_angle_attenuation')).toBeCloseTo(20, 10);
        expect(node?.get('spot_range')).toBe(40);
        expect(node?.get('light_specular')).toBe(1);
        expect(node?.get('light_color')).toEqual(new Color(1, 1, 1));
        expect(node?.get('shadow_color')).toEqual(new Color(0, 0, 0));
        expect(node?.attributeNames()).toEqual([
            'light_specular', 'light_color', 'shadow_color',
            'light_energy', 'spot_angle', 'spot_angle_attenuation', 'spot_range',
            'transform', 'light_negative', 'shadow_enabled',
        ]);
        expect(document.getNodes()).toEqual([node]);
    });

    it('converts omni energy and range', () => {
        const { converter, document, root } = setup();
        const result = converter.convert(document, lightObject('Lamp', makeLight({ energy: -250, cutoffDistance: 12 })), root);
        const node = result.kind === 'node' ? result.node : null;
        expect(node?.type).toBe('OmniLight');
        expect(node?.get('light_energy')).toBe(2.5);
        expect(node?.get('omni_range')).toBe(12);
        expect(node?.get('light_negative')).toBe(true);
    });

    it('keeps directional energy unscaled', () => {
        const { converter, document, root } = setup();
        const result = converter.convert(document, lightObject('Sun', makeLight({ type: 'SUN', energy: -3.5 })), root);
        const node = result.kind === 'node' ? result.node : null;
        expect(node?.type).toBe('DirectionalLight');
        expect(node?.get('light_energy')).toBe(3.5);
        expect(node?.get('light_negative')).toBe(true);
        expect(node?.has('omni_range')).toBe(false);
    });

    it('enables shadows only when the light casts them in the render engine too', () => {
        const { converter, document, root } = setup();
        const cases: Array<[boolean, boolean, boolean]> = [
            [true, true, true],
            [true, false, false],
            [false, true, false],
        ];
        for (const [useShadow, castShadow, expected] of cases) {
            const light = makeLight({ useShadow, renderEngine: { castShadow } });
            const result = converter.convert(document, lightObject('Lamp', light), root);
            const node = result.kind === 'node' ? result.node : null;
            expect(node?.get('shadow_enabled')).toBe(expected);
        }
    });

    it('corrects the light transform', () => {
        const { converter, document, root } = setup();
        const matrix = mat4.fromTranslation(mat4.create(), [1, 2, 3]);
        const result = converter.convert(document, lightObject('Lamp', makeLight(), matrix), root);
        const transform = result.kind === 'node' ? result.node.get('transform') : undefined;
        expect(transform).toBeInstanceOf(Transform);
        if (transform instanceof Transform) {
            expect(mat4.equals(transform.matrix, fixDirectionalTransform(matrix))).toBe(true);
        }
    });

    it('hands the node and light data to the animation exporter', () => {
        const { converter, animation, document, root } = setup();
        const light = makeLight();
        const result = converter.convert(document, lightObject('Lamp', light), root);
        const node = result.kind === 'node' ? result.node : null;
        expect(animation.exportAnimationData).toHaveBeenCalledWith(document, node, light, 'light');
    });

    it('skips unknown light kinds with a warning', () => {
        const { converter, animation, logger, document, root } = setup();
        const light = makeLight({ type: 'AREA' });

        const result = converter.convert(document, lightObject('Area', light), root);

        expect(result).toEqual({ kind: 'none' });
        expect(document.getNodes()).toHaveLength(0);
        expect(logger.warn).toHaveBeenCalledWith('Unknown light type. Use Point, Spot or Sun: Area');
        expect(animation.exportAnimationData).toHaveBeenCalledWith(document, null, light, 'light');
    });

    it('exports no animation for an unknown light kind', () => {
        const logger = makeLogger();
        const converter = new LightNodeConverter(logger, new ActionAnimationExporter(makeSettings(), logger));
        const document = new SceneDocument('/project/level.escn');
        const root = new NodeTemplate('Level', 'Spatial', null);
        const light = makeLight({
            type: 'AREA',
            animation: {
                action: 'AreaAction',
                fcurves: [{ dataPath: 'energy', arrayIndex: 0, keyframes: [{ frame: 1, value: 10 }, { frame: 10, value: 20 }] }],
            },
        });

        expect(() => converter.convert(document, lightObject('Area', light), root)).not.toThrow();
        expect(document.getNodes()).toHaveLength(0);
        expect(document.getInternalResources()).toHaveLength(0);
    });
});
