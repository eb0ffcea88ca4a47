import AnimationState from './animation-state';
import { resolveEasing } from './easing';
import PathModel from './path-model';
import { createFillEffect, createStrokeEffect } from './phase-effects';
import { ANIMATION_PHASE, ANIMATION_TYPE, DrawOptions, EASING, EasingFunction } from './types';

export interface RevealStep {
    path: PathModel;
    strokeStart: number;
    strokeDuration: number;
    fillStart: number;
    fillDuration: number;
    hasFill: boolean;
}

/**
 * Timeline of a draw. A path's stroke takes one `durationPerStep` per drawing
 * segment and its fill starts when that stroke ends. Sequential plans start each
 * path after the previous path's last phase; parallel plans start every stroke at 0.
 */
export function planReveal(models: PathModel[], options: DrawOptions): RevealStep[] {
    const { animate, fill, animType, durationPerStep, fillDuration } = options;
    let cursor: number = 0;

    return models.map(path => {
        const strokeStart: number = animType === ANIMATION_TYPE.SEQUENTIAL ? cursor : 0;
        const strokeDuration: number = animate ? path.segmentCount * durationPerStep : 0;
        const fillStart: number = fill ? strokeStart + strokeDuration : 0;
        const step: RevealStep = {
            path,
            strokeStart,
            strokeDuration,
            fillStart,
            fillDuration: fill && animate ? fillDuration : 0,
            hasFill: fill
        };

        cursor = fill ? step.fillStart + step.fillDuration : strokeStart + strokeDuration;

        return step;
    });
}

export function createRevealStates(steps: RevealStep[]): AnimationState[] {
    const linear: EasingFunction = resolveEasing(EASING.LINEAR);
    const result: AnimationState[] = [];

    steps.forEach(({ path, strokeStart, strokeDuration, fillStart, fillDuration, hasFill }) => {
        result.push(
            new AnimationState({
                model: path,
                phase: ANIMATION_PHASE.STROKE,
                start: strokeStart,
                duration: strokeDuration,
                easing: linear,
                effect: createStrokeEffect(path)
            })
        );

        if (hasFill) {
            result.push(
                new AnimationState({
                    model: path,
                    phase: ANIMATION_PHASE.FILL,
                    start: fillStart,
                    duration: fillDuration,
                    easing: linear,
                    effect: createFillEffect(path)
                })
            );
        }
    });

    return result;
}
