import { describe, expect, it } from '@jest/globals';
import { parsePath } from '@svg-reveal/svg-parser';
import { BoundingBox, getBoundingBox } from '@svg-reveal/geometry-utils';

import PathModel from '../path-model';
import { GROWTH_ORIGIN } from '../types';

function createSquare(): PathModel {
    return PathModel.fromPath(parsePath('M0 0 L10 0 L10 10 L0 10 Z'), 'square', [1, 0, 0, 1]);
}

describe('PathModel', () => {
    it('keeps one stroke polyline per drawing segment', () => {
        const model: PathModel = createSquare();

        expect(model.id).toBe('square');
        expect(model.segmentCount).toBe(4);
        expect(model.strokeSegments[3]).toEqual([0, 10, 0, 0]);
        expect(model.bounds).toEqual({ x: 0, y: 0, width: 10, height: 10 });
        expect(model.center).toEqual({ x: 5, y: 5 });
    });

    it('reveals whole segments then part of the next one', () => {
        const model: PathModel = createSquare();

        expect(model.getStrokePolylines(0)).toEqual([]);
        expect(model.getStrokePolylines(0.625)).toEqual([
            [0, 0, 10, 0],
            [10, 0, 10, 10],
            [10, 10, 5, 10]
        ]);
        expect(model.getStrokePolylines(1)).toHaveLength(4);
    });

    it('uses the stroke progress by default', () => {
        const model: PathModel = createSquare();

        model.strokeProgress = 0.25;

        expect(model.getStrokePolylines()).toEqual([[0, 0, 10, 0]]);
    });

    it('scales the fill from the left edge', () => {
        const model: PathModel = createSquare();

        model.applyGrowth(GROWTH_ORIGIN.LEFT, 0.5);

        expect(getBoundingBox(model.fillMesh.vertices)).toEqual({ x: 0, y: 0, width: 5, height: 10 });
        expect(model.fillOpacity).toBe(1);
    });

    it('scales the fill towards the right edge', () => {
        const model: PathModel = createSquare();

        model.applyGrowth(GROWTH_ORIGIN.RIGHT, 0.25);

        expect(getBoundingBox(model.fillMesh.vertices)).toEqual({ x: 7.5, y: 0, width: 2.5, height: 10 });
    });

    it('scales the fill on the vertical axis', () => {
        const model: PathModel = createSquare();

        model.applyGrowth(GROWTH_ORIGIN.TOP, 0.5);
        expect(getBoundingBox(model.fillMesh.vertices)).toEqual({ x: 0, y: 0, width: 10, height: 5 });

        model.applyGrowth(GROWTH_ORIGIN.CENTER_Y, 0.5);
        expect(getBoundingBox(model.fillMesh.vertices)).toEqual({ x: 0, y: 2.5, width: 10, height: 5 });
    });

    it('fades in without an origin', () => {
        const model: PathModel = createSquare();

        model.applyGrowth(GROWTH_ORIGIN.LEFT, 0.5);
        model.applyGrowth(GROWTH_ORIGIN.NONE, 0.5);

        expect(getBoundingBox(model.fillMesh.vertices)).toEqual({ x: 0, y: 0, width: 10, height: 10 });
        expect(model.fillColor).toEqual([1, 0, 0, 0.5]);
    });

    it('moves and turns the fill around its centre', () => {
        const model: PathModel = PathModel.fromPath(parsePath('M0 0 L4 0 L4 2 L0 2 Z'), 'bar', [1, 0, 0, 1]);
        const bounds = (): BoundingBox => getBoundingBox(model.fillMesh.vertices);

        model.applyPlacement({ x: 30, y: 30 });
        expect(bounds()).toEqual({ x: 28, y: 29, width: 4, height: 2 });

        model.applyPlacement({ x: 30, y: 30 }, 90);
        expect(bounds().x).toBeCloseTo(29, 4);
        expect(bounds().y).toBeCloseTo(28, 4);
        expect(bounds().width).toBeCloseTo(2, 4);
        expect(bounds().height).toBeCloseTo(4, 4);
    });

    it('restores the overlay', () => {
        const model: PathModel = createSquare();

        model.showStroke = true;
        model.strokeProgress = 1;
        model.applyGrowth(GROWTH_ORIGIN.BOTTOM, 0);
        model.resetOverlay();

        expect(model.showStroke).toBe(false);
        expect(model.strokeProgress).toBe(0);
        expect(model.fillColor).toEqual([1, 0, 0, 0]);
        expect(getBoundingBox(model.fillMesh.vertices)).toEqual({ x: 0, y: 0, width: 10, height: 10 });
    });
});
