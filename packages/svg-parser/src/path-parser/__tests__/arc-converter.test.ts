import { describe, expect, it } from '@jest/globals';

import arcToCubic, { estimateArcError, getArcPieceCount } from '../arc-converter';

describe('arcToCubic', () => {
    it('splits a half circle into quarter pieces', () => {
        const curves = arcToCubic(
            { from: { x: 0, y: 0 }, to: { x: 20, y: 0 }, rx: 10, ry: 10, rotation: 0, largeArc: false, sweep: true },
            0.1
        );
        const handle: number = (4 / 3) * Math.tan(Math.PI / 8) * 10;

        expect(curves).toHaveLength(2);
        expect(curves[0].control1.x).toBeCloseTo(0);
        expect(curves[0].control1.y).toBeCloseTo(-handle);
        expect(curves[1].control2.x).toBeCloseTo(20);
        expect(curves[1].control2.y).toBeCloseTo(-handle);
    });

    it('scales up radii that cannot reach the end point', () => {
        const curves = arcToCubic(
            { from: { x: 0, y: 0 }, to: { x: 20, y: 0 }, rx: 1, ry: 1, rotation: 0, largeArc: false, sweep: false },
            0.1
        );

        expect(curves[0].to.x).toBeCloseTo(10);
        expect(curves[0].to.y).toBeCloseTo(10);
        expect(curves[curves.length - 1].to).toEqual({ x: 20, y: 0 });
    });

    it('returns nothing for coincident end points', () => {
        expect(
            arcToCubic(
                { from: { x: 3, y: 3 }, to: { x: 3, y: 3 }, rx: 5, ry: 5, rotation: 0, largeArc: true, sweep: true },
                0.1
            )
        ).toEqual([]);
    });
});

describe('getArcPieceCount', () => {
    it('uses at least one piece per quarter turn', () => {
        expect(getArcPieceCount(10, Math.PI, 0.1)).toBe(2);
        expect(getArcPieceCount(10, 0.5 * Math.PI, 0.1)).toBe(1);
    });

    it('refines until the error is within tolerance', () => {
        expect(getArcPieceCount(10, Math.PI, 0.0001)).toBe(4);
        expect(estimateArcError(10, Math.PI / 4)).toBeLessThan(0.0001);
    });

    it('caps the piece count', () => {
        expect(getArcPieceCount(1e6, 2 * Math.PI, 1e-12)).toBe(64);
    });
});
