import { DEFAULT_ARC_TOLERANCE, PATH_ERROR_POLICY } from '@svg-reveal/svg-parser';
import { DEFAULT_RESOLUTION, FILL_RULE } from '@svg-reveal/geometry-utils';

import { ANIMATION_TYPE, DrawOptions, EASING, FollowOptions, GROWTH_ORIGIN, LoadOptions } from './types';

export const DEFAULT_DRAW_OPTIONS: DrawOptions = {
    fill: true,
    animate: false,
    animType: ANIMATION_TYPE.SEQUENTIAL,
    lineWidth: 2,
    lineColor: [0, 0, 0, 1],
    durationPerStep: 0.02,
    fillDuration: 0.4
};

export const DEFAULT_GROWTH_ORIGIN: GROWTH_ORIGIN = GROWTH_ORIGIN.NONE;

export const DEFAULT_EASING: EASING = EASING.OUT_SINE;

export const DEFAULT_SHAPE_DURATION: number = 0.3;

export const DEFAULT_LOAD_OPTIONS: LoadOptions = {
    resolution: DEFAULT_RESOLUTION,
    arcTolerance: DEFAULT_ARC_TOLERANCE,
    fillRule: FILL_RULE.NON_ZERO,
    onPathError: PATH_ERROR_POLICY.SKIP
};

export const DEFAULT_FOLLOW_OPTIONS: FollowOptions = {
    duration: 2,
    easing: EASING.LINEAR,
    repeat: false,
    rotate: false,
    keepOthers: true,
    showPath: true
};

export const ROTATION_STEP: number = 0.01;
