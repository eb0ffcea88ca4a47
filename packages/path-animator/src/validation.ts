import { PATH_ERROR_POLICY } from '@svg-reveal/svg-parser';
import { FILL_RULE } from '@svg-reveal/geometry-utils';

import {
    DEFAULT_DRAW_OPTIONS,
    DEFAULT_EASING,
    DEFAULT_FOLLOW_OPTIONS,
    DEFAULT_GROWTH_ORIGIN,
    DEFAULT_LOAD_OPTIONS,
    DEFAULT_SHAPE_DURATION
} from './constants';
import { isEasing } from './easing';
import { ConfigurationError, InvalidAnimationSpecError } from './errors';
import {
    ANIMATION_TYPE,
    AnimationSpec,
    AnimationSpecInput,
    DrawOptions,
    EASING,
    FollowOptions,
    FollowOptionsInput,
    GROWTH_ORIGIN,
    LoadOptions
} from './types';

const GROWTH_ORIGINS: ReadonlySet<string> = new Set<string>(Object.values(GROWTH_ORIGIN));

const ANIMATION_TYPES: ReadonlySet<string> = new Set<string>(Object.values(ANIMATION_TYPE));

const FILL_RULES: ReadonlySet<string> = new Set<string>(Object.values(FILL_RULE));

const PATH_ERROR_POLICIES: ReadonlySet<string> = new Set<string>(Object.values(PATH_ERROR_POLICY));

function isGrowthOrigin(value: string): value is GROWTH_ORIGIN {
    return GROWTH_ORIGINS.has(value);
}

function assertBoolean(option: string, value: unknown): void {
    if (typeof value !== 'boolean') {
        throw new ConfigurationError(option, 'expected a boolean');
    }
}

function assertNumber(option: string, value: unknown, min: number, exclusive: boolean = false): void {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < min || (exclusive && value === min)) {
        throw new ConfigurationError(option, `expected a finite number ${exclusive ? '>' : '>='} ${min}`);
    }
}

function assertOneOf(option: string, value: unknown, allowed: ReadonlySet<string>): void {
    if (typeof value !== 'string' || !allowed.has(value)) {
        throw new ConfigurationError(option, `expected one of ${Array.from(allowed).join(', ')}`);
    }
}

function assertCallback(option: string, value: unknown): void {
    if (value !== undefined && typeof value !== 'function') {
        throw new ConfigurationError(option, 'expected a function');
    }
}

function toEasing(option: string, value: string): EASING {
    if (!isEasing(value)) {
        throw new ConfigurationError(option, `unknown easing "${value}"`);
    }

    return value;
}

export function validateDrawOptions(input: Partial<DrawOptions> = {}): DrawOptions {
    const options: DrawOptions = { ...DEFAULT_DRAW_OPTIONS, ...input };
    const { lineColor } = options;

    assertBoolean('fill', options.fill);
    assertBoolean('animate', options.animate);
    assertOneOf('animType', options.animType, ANIMATION_TYPES);
    assertNumber('lineWidth', options.lineWidth, 0, true);
    assertNumber('durationPerStep', options.durationPerStep, 0, true);
    assertNumber('fillDuration', options.fillDuration, 0, true);
    assertCallback('onComplete', options.onComplete);

    if (
        !Array.isArray(lineColor) ||
        lineColor.length !== 4 ||
        !lineColor.every(channel => Number.isFinite(channel) && channel >= 0 && channel <= 1)
    ) {
        throw new ConfigurationError('lineColor', 'expected four channels between 0 and 1');
    }

    return { ...options, lineColor: [lineColor[0], lineColor[1], lineColor[2], lineColor[3]] };
}

export function validateAnimationSpecs(specs: AnimationSpecInput[]): AnimationSpec[] {
    if (!Array.isArray(specs)) {
        throw new ConfigurationError('animationConfig', 'expected a list of animation specs');
    }

    return specs.map((spec, index) => {
        const option: string = `animationConfig[${index}]`;

        if (typeof spec !== 'object' || spec === null) {
            throw new InvalidAnimationSpecError(option);
        }

        const {
            id,
            growthOrigin = DEFAULT_GROWTH_ORIGIN,
            easing = DEFAULT_EASING,
            duration = DEFAULT_SHAPE_DURATION,
            onComplete
        } = spec;

        if (typeof id !== 'string' || id === '') {
            throw new ConfigurationError(`${option}.id`, 'a path id is required');
        }

        if (!isGrowthOrigin(growthOrigin)) {
            throw new ConfigurationError(`${option}.growthOrigin`, `unknown growth origin "${growthOrigin}"`);
        }

        assertNumber(`${option}.duration`, duration, 0, true);
        assertCallback(`${option}.onComplete`, onComplete);

        return { id, growthOrigin, easing: toEasing(`${option}.easing`, easing), duration, onComplete };
    });
}

export function validateLoadOptions(input: Partial<LoadOptions> = {}): LoadOptions {
    const options: LoadOptions = { ...DEFAULT_LOAD_OPTIONS, ...input };

    assertNumber('resolution', options.resolution, 1);
    assertNumber('arcTolerance', options.arcTolerance, 0, true);
    assertOneOf('fillRule', options.fillRule, FILL_RULES);
    assertOneOf('onPathError', options.onPathError, PATH_ERROR_POLICIES);

    if (options.tolerance !== undefined) {
        assertNumber('tolerance', options.tolerance, 0, true);
    }

    return options;
}

export function validateFollowOptions(input: FollowOptionsInput = {}): FollowOptions {
    const { easing = DEFAULT_FOLLOW_OPTIONS.easing, ...rest } = input;
    const options: FollowOptions = { ...DEFAULT_FOLLOW_OPTIONS, ...rest, easing: toEasing('easing', easing) };

    assertNumber('duration', options.duration, 0, true);
    assertBoolean('repeat', options.repeat);
    assertBoolean('rotate', options.rotate);
    assertBoolean('keepOthers', options.keepOthers);
    assertBoolean('showPath', options.showPath);
    assertCallback('onComplete', options.onComplete);

    return options;
}
