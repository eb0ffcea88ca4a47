import { LoadIssue, ParsedDocument, SVGParser, ViewBox, WarningLogger } from '@svg-reveal/svg-parser';

import AnimationRun from './animation-run';
import AnimationState from './animation-state';
import { createRevealStates, planReveal } from './drawing-manager';
import { resolveEasing } from './easing';
import { UnresolvedAnimationTargetError } from './errors';
import FrameRenderer from './frame-renderer';
import PathFollower from './path-follower';
import PathModel from './path-model';
import { createFollowEffect, createGrowthEffect } from './phase-effects';
import {
    ANIMATION_PHASE,
    AnimationSpec,
    AnimationSpecInput,
    CompletionCallback,
    DrawOptions,
    FollowOptions,
    FollowOptionsInput,
    FrameScheduler,
    LoadOptions,
    RenderSurface
} from './types';
import { validateAnimationSpecs, validateDrawOptions, validateFollowOptions, validateLoadOptions } from './validation';

export type SvgAnimatorConfig = {
    surface: RenderSurface;
    scheduler?: FrameScheduler;
    logger?: WarningLogger;
    loadOptions?: Partial<LoadOptions>;
    // false keeps the document's y-down orientation on the surface
    flipY?: boolean;
};

export interface LoadedDocument {
    viewBox: ViewBox;
    models: PathModel[];
    issues: LoadIssue[];
}

/**
 * Entry point: loads documents, starts one run at a time and submits a frame
 * per tick. Starting a run cancels the previous one.
 */
export default class SvgAnimator {
    #renderer: FrameRenderer;

    #scheduler: FrameScheduler | null;

    #logger: WarningLogger;

    #loadOptions: LoadOptions;

    // source text of the current document
    #source: string | null = null;

    #document: LoadedDocument | null = null;

    #run: AnimationRun | null = null;

    #unsubscribe: (() => void) | null = null;

    public constructor({ surface, scheduler, logger = console, loadOptions = {}, flipY = true }: SvgAnimatorConfig) {
        this.#renderer = new FrameRenderer(surface, flipY);
        this.#scheduler = scheduler ?? null;
        this.#logger = logger;
        this.#loadOptions = validateLoadOptions(loadOptions);
    }

    public get document(): LoadedDocument | null {
        return this.#document;
    }

    public get run(): AnimationRun | null {
        return this.#run;
    }

    public load(svgText: string): LoadedDocument {
        if (this.#document !== null && this.#source === svgText) {
            return this.#document;
        }

        const { arcTolerance, onPathError } = this.#loadOptions;
        const parsed: ParsedDocument = SVGParser.parse(svgText, { arcTolerance, onPathError }, this.#logger);
        const document: LoadedDocument = {
            viewBox: parsed.viewBox,
            models: parsed.shapes.map(shape => PathModel.create(shape, this.#loadOptions)),
            issues: parsed.issues
        };

        this.#source = svgText;
        this.#document = document;

        return document;
    }

    public draw(svgText: string, options: Partial<DrawOptions> = {}): AnimationRun {
        const drawOptions: DrawOptions = validateDrawOptions(options);

        this.cancel();

        const document: LoadedDocument = this.load(svgText);

        document.models.forEach(model => {
            model.resetOverlay();
            model.strokeColor = [...drawOptions.lineColor];
            model.strokeWidth = drawOptions.lineWidth;
        });

        const states: AnimationState[] = createRevealStates(planReveal(document.models, drawOptions));

        return this.startRun(document, new AnimationRun(states, document.models), drawOptions.onComplete);
    }

    /**
     * Grows the listed paths one after another in list order. Unknown ids are
     * reported and skipped; finished paths stay visible.
     */
    public shapeAnimate(svgText: string, specs: AnimationSpecInput[], onComplete?: CompletionCallback): AnimationRun {
        const animationSpecs: AnimationSpec[] = validateAnimationSpecs(specs);

        this.cancel();

        const document: LoadedDocument = this.load(svgText);
        const states: AnimationState[] = [];
        const models: PathModel[] = [];
        let cursor: number = 0;

        animationSpecs.forEach(spec => {
            const model: PathModel | null = SvgAnimator.findModel(document, spec.id);

            if (model === null) {
                this.#logger.warn(new UnresolvedAnimationTargetError(spec.id).message);

                return;
            }

            if (!models.includes(model)) {
                model.resetOverlay();
                models.push(model);
            }

            states.push(
                new AnimationState({
                    model,
                    phase: ANIMATION_PHASE.SHAPE,
                    start: cursor,
                    duration: spec.duration,
                    easing: resolveEasing(spec.easing),
                    effect: createGrowthEffect(model, spec.growthOrigin),
                    onComplete: spec.onComplete
                })
            );
            cursor = cursor + spec.duration;
        });

        return this.startRun(document, new AnimationRun(states, models), onComplete);
    }

    // moves `elementId` along the path `pathId` of the current document
    public followPath(elementId: string, pathId: string, options: FollowOptionsInput = {}): AnimationRun {
        const followOptions: FollowOptions = validateFollowOptions(options);
        const document: LoadedDocument | null = this.#document;
        const mover: PathModel | null = document === null ? null : SvgAnimator.findModel(document, elementId);
        const guide: PathModel | null = document === null ? null : SvgAnimator.findModel(document, pathId);

        if (document === null || mover === null) {
            throw new UnresolvedAnimationTargetError(elementId);
        }

        if (guide === null) {
            throw new UnresolvedAnimationTargetError(pathId);
        }

        this.cancel();

        const { duration, easing, repeat, rotate, keepOthers, showPath, onComplete } = followOptions;
        const models: PathModel[] = keepOthers ? document.models.filter(model => model !== mover) : [];

        document.models.forEach(model => {
            model.resetOverlay();
            model.fillOpacity = keepOthers ? 1 : 0;
        });

        if (showPath) {
            guide.showStroke = true;
            guide.strokeProgress = 1;

            if (!models.includes(guide)) {
                models.push(guide);
            }
        }

        models.push(mover);

        const state: AnimationState = new AnimationState({
            model: mover,
            phase: ANIMATION_PHASE.FOLLOW,
            start: 0,
            duration,
            easing: resolveEasing(easing),
            effect: createFollowEffect(mover, new PathFollower(guide), rotate),
            repeat
        });

        return this.startRun(document, new AnimationRun([state], models), onComplete);
    }

    // advances the active run and submits one frame
    public advance(deltaTime: number): void {
        const run: AnimationRun | null = this.#run;

        if (run === null || run.isTerminal) {
            return;
        }

        run.advance(deltaTime);
        this.render();
    }

    public cancel(): void {
        const run: AnimationRun | null = this.#run;

        this.#run = null;
        this.stopTicks();

        if (run !== null) {
            run.cancel();
        }
    }

    private startRun(document: LoadedDocument, run: AnimationRun, onComplete?: CompletionCallback): AnimationRun {
        this.#document = document;
        this.#run = run;
        run.onComplete(() => {
            if (this.#run === run) {
                this.stopTicks();
            }
        });

        if (onComplete) {
            run.onComplete(onComplete);
        }

        run.start();
        this.render();

        if (!run.isTerminal && this.#run === run && this.#scheduler !== null) {
            this.#unsubscribe = this.#scheduler.schedule(deltaTime => this.advance(deltaTime));
        }

        return run;
    }

    private render(): void {
        if (this.#run !== null && this.#document !== null) {
            this.#renderer.render(this.#run.models, this.#document.viewBox);
        }
    }

    private stopTicks(): void {
        const unsubscribe: (() => void) | null = this.#unsubscribe;

        this.#unsubscribe = null;

        if (unsubscribe !== null) {
            unsubscribe();
        }
    }

    private static findModel(document: LoadedDocument, id: string): PathModel | null {
        return document.models.find(model => model.id === id) ?? null;
    }
}
