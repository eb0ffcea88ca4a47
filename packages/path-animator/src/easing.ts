import { ConfigurationError } from './errors';
import { EASING, EasingFunction } from './types';

const BACK_OVERSHOOT: number = 1.70158;

const ELASTIC_PERIOD: number = 0.3;

function outBounce(time: number): number {
    let t: number = time;

    if (t < 1 / 2.75) {
        return 7.5625 * t * t;
    }

    if (t < 2 / 2.75) {
        t = t - 1.5 / 2.75;

        return 7.5625 * t * t + 0.75;
    }

    if (t < 2.5 / 2.75) {
        t = t - 2.25 / 2.75;

        return 7.5625 * t * t + 0.9375;
    }

    t = t - 2.625 / 2.75;

    return 7.5625 * t * t + 0.984375;
}

function inBounce(time: number): number {
    return 1 - outBounce(1 - time);
}

function inElastic(time: number): number {
    const shift: number = ELASTIC_PERIOD / 4;
    const t: number = time - 1;

    if (time <= 0 || time >= 1) {
        return time <= 0 ? 0 : 1;
    }

    return -(Math.pow(2, 10 * t) * Math.sin(((t - shift) * (2 * Math.PI)) / ELASTIC_PERIOD));
}

function outElastic(time: number): number {
    const shift: number = ELASTIC_PERIOD / 4;

    if (time <= 0 || time >= 1) {
        return time <= 0 ? 0 : 1;
    }

    return Math.pow(2, -10 * time) * Math.sin(((time - shift) * (2 * Math.PI)) / ELASTIC_PERIOD) + 1;
}

function inOutElastic(time: number): number {
    const period: number = ELASTIC_PERIOD * 1.5;
    const shift: number = period / 4;
    const t: number = time * 2 - 1;

    if (time <= 0 || time >= 1) {
        return time <= 0 ? 0 : 1;
    }

    if (t < 0) {
        return -0.5 * (Math.pow(2, 10 * t) * Math.sin(((t - shift) * (2 * Math.PI)) / period));
    }

    return Math.pow(2, -10 * t) * Math.sin(((t - shift) * (2 * Math.PI)) / period) * 0.5 + 1;
}

// symmetric in/out built from an "in" curve
function inOut(easeIn: EasingFunction): EasingFunction {
    return (time: number) => (time < 0.5 ? 0.5 * easeIn(time * 2) : 1 - 0.5 * easeIn((1 - time) * 2));
}

function out(easeIn: EasingFunction): EasingFunction {
    return (time: number) => 1 - easeIn(1 - time);
}

const inQuad: EasingFunction = time => time * time;

const inCubic: EasingFunction = time => time * time * time;

const inQuart: EasingFunction = time => time * time * time * time;

const inQuint: EasingFunction = time => time * time * time * time * time;

const inSine: EasingFunction = time => 1 - Math.cos((time * Math.PI) / 2);

const inExpo: EasingFunction = time => (time <= 0 ? 0 : Math.pow(2, 10 * (time - 1)));

const inCirc: EasingFunction = time => 1 - Math.sqrt(1 - time * time);

const inBack: EasingFunction = time => time * time * ((BACK_OVERSHOOT + 1) * time - BACK_OVERSHOOT);

function inOutBack(time: number): number {
    const overshoot: number = BACK_OVERSHOOT * 1.525;
    let t: number = time * 2;

    if (t < 1) {
        return 0.5 * (t * t * ((overshoot + 1) * t - overshoot));
    }

    t = t - 2;

    return 0.5 * (t * t * ((overshoot + 1) * t + overshoot) + 2);
}

function inOutBounce(time: number): number {
    return time < 0.5 ? inBounce(time * 2) * 0.5 : outBounce(time * 2 - 1) * 0.5 + 0.5;
}

const EASING_FUNCTIONS: Record<EASING, EasingFunction> = {
    [EASING.LINEAR]: time => time,
    [EASING.IN_QUAD]: inQuad,
    [EASING.OUT_QUAD]: out(inQuad),
    [EASING.IN_OUT_QUAD]: inOut(inQuad),
    [EASING.IN_CUBIC]: inCubic,
    [EASING.OUT_CUBIC]: out(inCubic),
    [EASING.IN_OUT_CUBIC]: inOut(inCubic),
    [EASING.IN_QUART]: inQuart,
    [EASING.OUT_QUART]: out(inQuart),
    [EASING.IN_OUT_QUART]: inOut(inQuart),
    [EASING.IN_QUINT]: inQuint,
    [EASING.OUT_QUINT]: out(inQuint),
    [EASING.IN_OUT_QUINT]: inOut(inQuint),
    [EASING.IN_SINE]: inSine,
    [EASING.OUT_SINE]: time => Math.sin((time * Math.PI) / 2),
    [EASING.IN_OUT_SINE]: time => -0.5 * (Math.cos(Math.PI * time) - 1),
    [EASING.IN_EXPO]: inExpo,
    [EASING.OUT_EXPO]: out(inExpo),
    [EASING.IN_OUT_EXPO]: inOut(inExpo),
    [EASING.IN_CIRC]: inCirc,
    [EASING.OUT_CIRC]: out(inCirc),
    [EASING.IN_OUT_CIRC]: inOut(inCirc),
    [EASING.IN_BACK]: inBack,
    [EASING.OUT_BACK]: out(inBack),
    [EASING.IN_OUT_BACK]: inOutBack,
    [EASING.IN_ELASTIC]: inElastic,
    [EASING.OUT_ELASTIC]: outElastic,
    [EASING.IN_OUT_ELASTIC]: inOutElastic,
    [EASING.IN_BOUNCE]: inBounce,
    [EASING.OUT_BOUNCE]: outBounce,
    [EASING.IN_OUT_BOUNCE]: inOutBounce
};

const EASING_NAMES: ReadonlySet<string> = new Set<string>(Object.values(EASING));

export function isEasing(value: string): value is EASING {
    return EASING_NAMES.has(value);
}

export function resolveEasing(name: string): EasingFunction {
    if (!isEasing(name)) {
        throw new ConfigurationError('easing', `unknown easing "${name}"`);
    }

    return EASING_FUNCTIONS[name];
}

/**
 * Eased progress after `elapsed` seconds of a `duration` long phase. Reaching the
 * duration is checked first, so a zero duration is already finished at time 0.
 * Only the time fraction is clamped. The eased value is returned as is, so back
 * and elastic curves overshoot past 0 and 1 between the endpoints.
 */
export function computeProgress(elapsed: number, duration: number, easing: EasingFunction): number {
    if (elapsed >= duration) {
        return 1;
    }

    if (elapsed <= 0) {
        return 0;
    }

    return easing(Math.min(Math.max(elapsed / duration, 0), 1));
}
