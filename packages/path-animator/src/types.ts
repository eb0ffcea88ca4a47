import type { PATH_ERROR_POLICY, RGBA } from '@svg-reveal/svg-parser';
import type { FILL_RULE } from '@svg-reveal/geometry-utils';

export enum EASING {
    LINEAR = 'linear',
    IN_QUAD = 'in_quad',
    OUT_QUAD = 'out_quad',
    IN_OUT_QUAD = 'in_out_quad',
    IN_CUBIC = 'in_cubic',
    OUT_CUBIC = 'out_cubic',
    IN_OUT_CUBIC = 'in_out_cubic',
    IN_QUART = 'in_quart',
    OUT_QUART = 'out_quart',
    IN_OUT_QUART = 'in_out_quart',
    IN_QUINT = 'in_quint',
    OUT_QUINT = 'out_quint',
    IN_OUT_QUINT = 'in_out_quint',
    IN_SINE = 'in_sine',
    OUT_SINE = 'out_sine',
    IN_OUT_SINE = 'in_out_sine',
    IN_EXPO = 'in_expo',
    OUT_EXPO = 'out_expo',
    IN_OUT_EXPO = 'in_out_expo',
    IN_CIRC = 'in_circ',
    OUT_CIRC = 'out_circ',
    IN_OUT_CIRC = 'in_out_circ',
    IN_BACK = 'in_back',
    OUT_BACK = 'out_back',
    IN_OUT_BACK = 'in_out_back',
    IN_ELASTIC = 'in_elastic',
    OUT_ELASTIC = 'out_elastic',
    IN_OUT_ELASTIC = 'in_out_elastic',
    IN_BOUNCE = 'in_bounce',
    OUT_BOUNCE = 'out_bounce',
    IN_OUT_BOUNCE = 'in_out_bounce'
}

export enum GROWTH_ORIGIN {
    LEFT = 'left',
    RIGHT = 'right',
    TOP = 'top',
    BOTTOM = 'bottom',
    CENTER_X = 'center_x',
    CENTER_Y = 'center_y',
    NONE = 'none'
}

export enum ANIMATION_TYPE {
    SEQUENTIAL = 'sequential',
    PARALLEL = 'parallel'
}

export enum ANIMATION_STATUS {
    PENDING = 'pending',
    RUNNING = 'running',
    COMPLETED = 'completed',
    CANCELLED = 'cancelled'
}

export enum ANIMATION_PHASE {
    STROKE = 'stroke',
    FILL = 'fill',
    SHAPE = 'shape',
    FOLLOW = 'follow'
}

export type EasingFunction = (time: number) => number;

export type CompletionCallback = () => void;

// applies the eased progress of one phase to its path
export type PhaseEffect = (progress: number) => void;

export type DrawOptions = {
    fill: boolean;
    animate: boolean;
    animType: ANIMATION_TYPE;
    lineWidth: number;
    lineColor: RGBA;
    durationPerStep: number;
    fillDuration: number;
    onComplete?: CompletionCallback;
};

export type AnimationSpec = {
    id: string;
    growthOrigin: GROWTH_ORIGIN;
    easing: EASING;
    duration: number;
    onComplete?: CompletionCallback;
};

// what callers pass in, names are checked at validation time
export type AnimationSpecInput = {
    id: string;
    growthOrigin?: string;
    easing?: string;
    duration?: number;
    onComplete?: CompletionCallback;
};

export type LoadOptions = {
    resolution: number;
    tolerance?: number;
    arcTolerance: number;
    fillRule: FILL_RULE;
    onPathError: PATH_ERROR_POLICY;
};

export type FollowOptions = {
    duration: number;
    easing: EASING;
    repeat: boolean;
    rotate: boolean;
    keepOthers: boolean;
    showPath: boolean;
    onComplete?: CompletionCallback;
};

export type FollowOptionsInput = Partial<Omit<FollowOptions, 'easing'>> & {
    easing?: string;
};

export interface Viewport {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface RenderSurface {
    readonly viewport: Viewport;
    clear(): void;
    submit(vertices: Float32Array, indices: Uint32Array, color: RGBA): void;
    present?(): void;
}

export interface FrameScheduler {
    // returns the function that stops the ticks
    schedule(tick: (deltaTime: number) => void): () => void;
}
