import { computeProgress } from './easing';
import PathModel from './path-model';
import { ANIMATION_PHASE, ANIMATION_STATUS, CompletionCallback, EasingFunction, PhaseEffect } from './types';

export type AnimationStateConfig = {
    model: PathModel;
    phase: ANIMATION_PHASE;
    start: number;
    duration: number;
    easing: EasingFunction;
    effect: PhaseEffect;
    // wraps the clock, the state then never completes
    repeat?: boolean;
    onComplete?: CompletionCallback;
};

/**
 * Ties one path to one phase of a run. `PENDING` until the run clock reaches
 * `start`, then `RUNNING` until `duration` has elapsed. `COMPLETED` and
 * `CANCELLED` are terminal.
 */
export default class AnimationState {
    #config: AnimationStateConfig;

    #status: ANIMATION_STATUS = ANIMATION_STATUS.PENDING;

    #elapsed: number = 0;

    #progress: number = 0;

    public constructor(config: AnimationStateConfig) {
        this.#config = config;
    }

    public get model(): PathModel {
        return this.#config.model;
    }

    public get phase(): ANIMATION_PHASE {
        return this.#config.phase;
    }

    public get start(): number {
        return this.#config.start;
    }

    public get duration(): number {
        return this.#config.duration;
    }

    public get end(): number {
        return this.#config.start + this.#config.duration;
    }

    public get status(): ANIMATION_STATUS {
        return this.#status;
    }

    public get elapsed(): number {
        return this.#elapsed;
    }

    public get progress(): number {
        return this.#progress;
    }

    public get isTerminal(): boolean {
        return this.#status === ANIMATION_STATUS.COMPLETED || this.#status === ANIMATION_STATUS.CANCELLED;
    }

    // returns true when the state completed during this update
    public update(time: number): boolean {
        const { start, duration, easing, effect, repeat = false, onComplete } = this.#config;
        let elapsed: number = time - start;

        if (this.isTerminal || elapsed < 0) {
            return false;
        }

        if (repeat && duration > 0) {
            elapsed = elapsed % duration;
        }

        this.#status = ANIMATION_STATUS.RUNNING;
        this.#elapsed = elapsed;
        this.#progress = computeProgress(elapsed, duration, easing);
        effect(this.#progress);

        if (repeat && duration > 0) {
            return false;
        }

        if (elapsed >= duration) {
            this.#status = ANIMATION_STATUS.COMPLETED;

            if (onComplete) {
                onComplete();
            }

            return true;
        }

        return false;
    }

    public cancel(): void {
        if (!this.isTerminal) {
            this.#status = ANIMATION_STATUS.CANCELLED;
        }
    }
}
