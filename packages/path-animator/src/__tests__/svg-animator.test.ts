import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { DocumentLoadError, WarningLogger } from '@svg-reveal/svg-parser';

import AnimationRun from '../animation-run';
import { ConfigurationError, UnresolvedAnimationTargetError } from '../errors';
import SvgAnimator, { LoadedDocument } from '../svg-animator';
import { ANIMATION_STATUS } from '../types';
import { ManualScheduler, RecordingSurface, getRange } from './stand-ins';

const TRIANGLES_SVG: string = `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 100 100">
    <path id="a" d="M0 0 L10 0 L10 10 Z" fill="#ff0000"/>
    <path id="b" d="M20 20 L30 20 L30 30 Z" fill="#00ff00"/>
    <path id="grad" d="M50 50 L60 50 L60 60 Z" fill="url(#g)"/>
</svg>`;

const TRACK_SVG: string = `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 100 100">
    <path id="dot" d="M0 0 L2 0 L2 2 L0 2 Z" fill="#0000ff"/>
    <path id="track" d="M10 10 L50 10" fill="none"/>
</svg>`;

const RAIL_SVG: string = `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 100 100">
    <path id="bar" d="M0 0 L4 0 L4 2 L0 2 Z" fill="#0000ff"/>
    <path id="rail" d="M10 10 L10 50" fill="none"/>
</svg>`;

describe('SvgAnimator', () => {
    let surface: RecordingSurface;
    let scheduler: ManualScheduler;
    let messages: string[];
    let logger: WarningLogger;
    let animator: SvgAnimator;

    beforeEach(() => {
        surface = new RecordingSurface();
        scheduler = new ManualScheduler();
        messages = [];
        logger = { warn: (message: string) => messages.push(message) };
        animator = new SvgAnimator({ surface, scheduler, logger });
    });

    describe('draw', () => {
        it('renders a static document in one frame', () => {
            const onComplete = jest.fn();
            const run: AnimationRun = animator.draw(TRIANGLES_SVG, { onComplete });

            expect(run.status).toBe(ANIMATION_STATUS.COMPLETED);
            expect(onComplete).toHaveBeenCalledTimes(1);
            expect(scheduler.size).toBe(0);
            expect(surface.frames).toHaveLength(1);
            expect(surface.lastFrame.map(mesh => mesh.color)).toEqual([
                [1, 0, 0, 1],
                [0, 0, 0, 1],
                [0, 1, 0, 1],
                [0, 0, 0, 1],
                [1, 1, 1, 1],
                [0, 0, 0, 1]
            ]);
            expect(surface.lastFrame[1].indices).toHaveLength(18);
            expect(messages).toEqual(['Unsupported color "url(#g)", only hex colors are accepted']);
        });

        it('leaves a path without a fill attribute unpainted', () => {
            animator.draw('<svg viewBox="0 0 100 100"><path id="bare" d="M0 0 L10 0 L10 10 Z"/></svg>');

            expect(surface.lastFrame.map(mesh => mesh.color)).toEqual([[0, 0, 0, 1]]);
            expect(animator.document?.models[0].fillColor).toEqual([1, 1, 1, 0]);
        });

        it('applies the line style', () => {
            animator.draw(TRIANGLES_SVG, { fill: false, lineColor: [0, 0, 1, 1], lineWidth: 4 });

            expect(surface.lastFrame.map(mesh => mesh.color)).toEqual([
                [0, 0, 1, 1],
                [0, 0, 1, 1],
                [0, 0, 1, 1]
            ]);
            expect(surface.lastFrame[0].vertices.slice(0, 4)).toEqual([0, 102, 0, 98]);
        });

        it('ticks an animated draw to completion', () => {
            const onComplete = jest.fn();
            const run: AnimationRun = animator.draw(TRIANGLES_SVG, {
                animate: true,
                durationPerStep: 0.1,
                fillDuration: 0.4,
                onComplete
            });

            expect(run.duration).toBeCloseTo(2.1, 10);
            expect(scheduler.size).toBe(1);
            expect(surface.lastFrame).toEqual([]);

            scheduler.tick(0.15);
            expect(surface.lastFrame).toHaveLength(1);
            expect(surface.lastFrame[0].indices).toHaveLength(12);

            scheduler.tick(1);
            scheduler.tick(1);

            expect(run.status).toBe(ANIMATION_STATUS.COMPLETED);
            expect(onComplete).toHaveBeenCalledTimes(1);
            expect(scheduler.size).toBe(0);
            expect(surface.lastFrame).toHaveLength(6);

            const frameCount: number = surface.frames.length;

            animator.advance(1);
            expect(surface.frames).toHaveLength(frameCount);
        });

        it('cancels the previous run when a new one starts', () => {
            const first = jest.fn();
            const second = jest.fn();
            const previous: AnimationRun = animator.draw(TRIANGLES_SVG, { animate: true, onComplete: first });

            animator.draw(TRIANGLES_SVG, { onComplete: second });
            scheduler.tick(10);

            expect(previous.status).toBe(ANIMATION_STATUS.CANCELLED);
            expect(first).not.toHaveBeenCalled();
            expect(second).toHaveBeenCalledTimes(1);
            expect(scheduler.size).toBe(0);
        });

        it('rejects invalid options before touching the current run', () => {
            const run: AnimationRun = animator.draw(TRIANGLES_SVG, { animate: true });

            expect(() => animator.draw(TRIANGLES_SVG, { lineWidth: -1 })).toThrow(ConfigurationError);
            expect(run.status).toBe(ANIMATION_STATUS.RUNNING);
        });

        it('keeps the document orientation when flipping is off', () => {
            const flat: SvgAnimator = new SvgAnimator({ surface, logger, flipY: false });

            flat.draw(TRACK_SVG);
            expect(getRange(surface.lastFrame[0].vertices, 1)).toEqual([0, 2]);

            animator.draw(TRACK_SVG);
            expect(getRange(surface.lastFrame[0].vertices, 1)).toEqual([98, 100]);
        });
    });

    describe('load', () => {
        it('parses each document once', () => {
            const loaded: LoadedDocument = animator.load(TRIANGLES_SVG);

            expect(animator.load(TRIANGLES_SVG)).toBe(loaded);
            expect(animator.document).toBe(loaded);
            expect(loaded.models.map(model => model.id)).toEqual(['a', 'b', 'grad']);
            expect(loaded.issues).toHaveLength(1);
            expect(messages).toHaveLength(1);
        });

        it('keeps only the current document', () => {
            const first: LoadedDocument = animator.load(TRIANGLES_SVG);

            animator.load(TRACK_SVG);

            const reloaded: LoadedDocument = animator.load(TRIANGLES_SVG);

            expect(reloaded).not.toBe(first);
            expect(reloaded.models.map(model => model.id)).toEqual(['a', 'b', 'grad']);
            expect(messages).toHaveLength(2);
        });

        it('throws on markup without an svg root', () => {
            expect(() => animator.draw('<div></div>')).toThrow(DocumentLoadError);
        });
    });

    describe('shapeAnimate', () => {
        it('grows the listed paths in order', () => {
            const onComplete = jest.fn();
            const onGrown = jest.fn();
            const run: AnimationRun = animator.shapeAnimate(
                TRIANGLES_SVG,
                [
                    { id: 'b', growthOrigin: 'left', duration: 1, easing: 'linear', onComplete: onGrown },
                    { id: 'missing' },
                    { id: 'a', duration: 1, easing: 'linear' }
                ],
                onComplete
            );

            expect(messages).toContain('No path with id "missing" in the document');
            expect(run.models.map(model => model.id)).toEqual(['b', 'a']);

            animator.advance(0.5);
            expect(surface.lastFrame).toHaveLength(1);
            expect(getRange(surface.lastFrame[0].vertices, 0)).toEqual([20, 25]);

            animator.advance(1);
            expect(onGrown).toHaveBeenCalledTimes(1);
            expect(getRange(surface.lastFrame[0].vertices, 0)).toEqual([20, 30]);
            expect(surface.lastFrame[1].color).toEqual([1, 0, 0, 0.5]);
            expect(onComplete).not.toHaveBeenCalled();

            animator.advance(1);
            expect(onComplete).toHaveBeenCalledTimes(1);
            expect(run.status).toBe(ANIMATION_STATUS.COMPLETED);
        });

        it('completes at once when no id resolves', () => {
            const onComplete = jest.fn();
            const run: AnimationRun = animator.shapeAnimate(TRIANGLES_SVG, [{ id: 'nope' }], onComplete);

            expect(run.status).toBe(ANIMATION_STATUS.COMPLETED);
            expect(onComplete).toHaveBeenCalledTimes(1);
            expect(scheduler.size).toBe(0);
        });

        it('rejects an unknown growth origin', () => {
            expect(() => animator.shapeAnimate(TRIANGLES_SVG, [{ id: 'a', growthOrigin: 'diagonal' }])).toThrow(
                ConfigurationError
            );
        });
    });

    describe('followPath', () => {
        it('moves the element along the guide path', () => {
            const onComplete = jest.fn();

            animator.load(TRACK_SVG);
            animator.followPath('dot', 'track', { duration: 2, onComplete });

            const dot = (): number[] => surface.lastFrame[surface.lastFrame.length - 1].vertices;

            expect(surface.lastFrame).toHaveLength(2);
            expect(getRange(dot(), 0)).toEqual([9, 11]);
            expect(getRange(dot(), 1)).toEqual([89, 91]);

            animator.advance(1);
            expect(getRange(dot(), 0)).toEqual([29, 31]);

            animator.advance(1);
            expect(onComplete).toHaveBeenCalledTimes(1);
            expect(getRange(dot(), 0)).toEqual([49, 51]);
        });

        it('turns the element with the path', () => {
            animator.load(RAIL_SVG);
            animator.followPath('bar', 'rail', { rotate: true });

            const [minX, maxX] = getRange(surface.lastFrame[1].vertices, 0);
            const [minY, maxY] = getRange(surface.lastFrame[1].vertices, 1);

            expect(minX).toBeCloseTo(9, 4);
            expect(maxX).toBeCloseTo(11, 4);
            expect(minY).toBeCloseTo(88, 4);
            expect(maxY).toBeCloseTo(92, 4);
        });

        it('hides the other paths on request', () => {
            animator.load(TRACK_SVG);
            animator.followPath('dot', 'track', { keepOthers: false, showPath: false });

            expect(surface.lastFrame).toHaveLength(1);
        });

        it('keeps repeating', () => {
            animator.load(TRACK_SVG);

            const run: AnimationRun = animator.followPath('dot', 'track', { duration: 2, repeat: true });

            scheduler.tick(3);

            expect(run.status).toBe(ANIMATION_STATUS.RUNNING);
            expect(scheduler.size).toBe(1);
            expect(getRange(surface.lastFrame[1].vertices, 0)).toEqual([29, 31]);
        });

        it('throws for unknown ids', () => {
            expect(() => animator.followPath('dot', 'track')).toThrow(UnresolvedAnimationTargetError);

            animator.load(TRACK_SVG);

            expect(() => animator.followPath('ghost', 'track')).toThrow('No path with id "ghost" in the document');
            expect(() => animator.followPath('dot', 'ghost')).toThrow('No path with id "ghost" in the document');
        });
    });
});
