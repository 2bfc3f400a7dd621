import type { ReadonlyMat4 } from 'gl-matrix';

// Source scene model
export type RGB = readonly [number, number, number];

export interface Keyframe {
    frame: number;
    value: number;
}

export interface FCurve {
    dataPath: string;         // source attribute the curve animates, e.g. 'energy'
    arrayIndex: number;       // channel for vector attributes (color r/g/b), 0 otherwise
    keyframes: Keyframe[];
}

export interface AnimationData {
    action: string;
    fcurves: FCurve[];
}

export interface CameraData {
    name: string;
    type: string;             // 'PERSP' | 'ORTHO' | 'PANO'
    angle: number;            // radians
    clipStart: number;
    clipEnd: number;
    orthoScale: number;
    animation?: AnimationData;
}

export interface LightData {
    name: string;
    type: string;             // 'POINT' | 'SPOT' | 'SUN', anything else is not exported
    energy: number;
    color: RGB;
    shadowColor: RGB;
    specularFactor: number;
    cutoffDistance: number;
    spotSize: number;         // full cone angle, radians
    spotBlend: number;        // 0..1
    useShadow: boolean;
    renderEngine: { castShadow: boolean };
    animation?: AnimationData;
}

export type AnimatedData = CameraData | LightData;

export const OTHER_OBJECT_TYPES = [
    'MESH', 'ARMATURE', 'CURVE', 'SURFACE', 'META', 'FONT', 'LATTICE', 'SPEAKER', 'LIGHT_PROBE',
] as const;

export type OtherObjectType = typeof OTHER_OBJECT_TYPES[number];

interface SourceObjectBase {
    name: string;
    matrixLocal: ReadonlyMat4;
    children: SourceObject[];
}

export interface EmptyObject extends SourceObjectBase {
    type: 'EMPTY';
}

export interface CameraObject extends SourceObjectBase {
    type: 'CAMERA';
    data: CameraData;
}

export interface LightObject extends SourceObjectBase {
    type: 'LIGHT';
    data: LightData;
}

// Objects with no converter of their own are exported as placeholders
export interface OtherObject extends SourceObjectBase {
    type: OtherObjectType;
}

export type SourceObject = EmptyObject | CameraObject | LightObject | OtherObject;

export type SourceObjectType = SourceObject['type'];

export interface SourceScene {
    name: string;
    objects: SourceObject[];
}

// Export settings
export type SearchPathMode = 'PROJECT_DIR' | 'EXPORT_DIR' | 'NONE';

export interface ExportSettings {
    path: string;                               // target .escn/.tscn file
    objectTypes: ReadonlySet<SourceObjectType>; // which object kinds produce nodes
    materialSearchPaths: SearchPathMode;        // where linked scenes are searched for
    projectPathFunc: () => string | null;       // lazily resolves the Godot project root
    fps: number;
    frameStart: number;
    verbose: boolean;
}

export interface ExportProgress {
    total: number;
    completed: number;
    current: string;
    errors: string[];
}

export interface BaseExporter {
    export(): Promise<void>;
}
