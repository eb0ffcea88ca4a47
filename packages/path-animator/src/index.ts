export { default as SvgAnimator } from './svg-animator';
export type { SvgAnimatorConfig, LoadedDocument } from './svg-animator';
export { default as PathModel } from './path-model';
export { default as PathFollower } from './path-follower';
export { default as AnimationState } from './animation-state';
export type { AnimationStateConfig } from './animation-state';
export { default as AnimationRun } from './animation-run';
export { default as FrameRenderer } from './frame-renderer';
export { planReveal, createRevealStates } from './drawing-manager';
export type { RevealStep } from './drawing-manager';
export { computeProgress, resolveEasing, isEasing } from './easing';
export { createStrokeEffect, createFillEffect, createGrowthEffect, createFollowEffect } from './phase-effects';
export { validateDrawOptions, validateAnimationSpecs, validateLoadOptions, validateFollowOptions } from './validation';
export { UnresolvedAnimationTargetError, ConfigurationError, InvalidAnimationSpecError } from './errors';
export {
    DEFAULT_DRAW_OPTIONS,
    DEFAULT_LOAD_OPTIONS,
    DEFAULT_FOLLOW_OPTIONS,
    DEFAULT_EASING,
    DEFAULT_GROWTH_ORIGIN,
    DEFAULT_SHAPE_DURATION
} from './constants';
export { EASING, GROWTH_ORIGIN, ANIMATION_TYPE, ANIMATION_STATUS, ANIMATION_PHASE } from './types';
export type {
    EasingFunction,
    CompletionCallback,
    PhaseEffect,
    DrawOptions,
    AnimationSpec,
    AnimationSpecInput,
    LoadOptions,
    FollowOptions,
    FollowOptionsInput,
    Viewport,
    RenderSurface,
    FrameScheduler
} from './types';
