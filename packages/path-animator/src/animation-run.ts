import AnimationState from './animation-state';
import PathModel from './path-model';
import { ANIMATION_STATUS, CompletionCallback } from './types';

/**
 * Document level animation group. Owns its states and its clock; completion
 * handlers fire once, after the last state's own callback.
 */
export default class AnimationRun {
    #states: AnimationState[];

    #models: PathModel[];

    #handlers: CompletionCallback[] = [];

    #status: ANIMATION_STATUS = ANIMATION_STATUS.PENDING;

    #time: number = 0;

    // models are the paths the run renders, states only drive some of them
    public constructor(states: AnimationState[], models: PathModel[]) {
        this.#states = states;
        this.#models = models;
    }

    public get states(): AnimationState[] {
        return this.#states;
    }

    public get models(): PathModel[] {
        return this.#models;
    }

    public get status(): ANIMATION_STATUS {
        return this.#status;
    }

    public get time(): number {
        return this.#time;
    }

    public get isTerminal(): boolean {
        return this.#status === ANIMATION_STATUS.COMPLETED || this.#status === ANIMATION_STATUS.CANCELLED;
    }

    // the total length when no state repeats
    public get duration(): number {
        return this.#states.reduce((result, state) => Math.max(result, state.end), 0);
    }

    public onComplete(handler: CompletionCallback): this {
        if (this.#status === ANIMATION_STATUS.COMPLETED) {
            handler();
        } else if (this.#status !== ANIMATION_STATUS.CANCELLED) {
            this.#handlers.push(handler);
        }

        return this;
    }

    public start(): this {
        if (this.#status !== ANIMATION_STATUS.PENDING) {
            return this;
        }

        this.#status = ANIMATION_STATUS.RUNNING;
        this.update();

        return this;
    }

    public advance(deltaTime: number): void {
        if (this.#status !== ANIMATION_STATUS.RUNNING) {
            return;
        }

        this.#time = this.#time + Math.max(deltaTime, 0);
        this.update();
    }

    public cancel(): void {
        if (this.isTerminal) {
            return;
        }

        this.#status = ANIMATION_STATUS.CANCELLED;
        this.#handlers = [];
        this.#states.forEach(state => state.cancel());
    }

    private update(): void {
        const stateCount: number = this.#states.length;
        let i: number = 0;

        for (i = 0; i < stateCount; ++i) {
            this.#states[i].update(this.#time);

            // a callback may have cancelled the run
            if (this.#status !== ANIMATION_STATUS.RUNNING) {
                return;
            }
        }

        if (this.#states.every(state => state.status === ANIMATION_STATUS.COMPLETED)) {
            this.complete();
        }
    }

    private complete(): void {
        const handlers: CompletionCallback[] = this.#handlers;

        this.#status = ANIMATION_STATUS.COMPLETED;
        this.#handlers = [];
        handlers.forEach(handler => handler());
    }
}
