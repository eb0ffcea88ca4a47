import { describe, expect, it } from '@jest/globals';

import { resolveContours } from '../contour-resolver';
import { signedArea } from '../contours';
import { FILL_RULE, Polyline } from '../types';

function getAreas(contours: Polyline[]): number[] {
    return contours.map(contour => Math.abs(signedArea(contour))).sort((a, b) => a - b);
}

describe('resolveContours', () => {
    it('splits a bowtie into two triangles', () => {
        const result: Polyline[] = resolveContours([[0, 0, 10, 10, 10, 0, 0, 10]]);

        expect(getAreas(result)).toEqual([25, 25]);
    });

    it('merges overlapping contours under nonzero', () => {
        const result: Polyline[] = resolveContours(
            [
                [0, 0, 10, 0, 10, 10, 0, 10],
                [5, 0, 15, 0, 15, 10, 5, 10]
            ],
            FILL_RULE.NON_ZERO
        );

        expect(getAreas(result)).toEqual([150]);
    });

    it('cuts the overlap out under evenodd', () => {
        const result: Polyline[] = resolveContours(
            [
                [0, 0, 10, 0, 10, 10, 0, 10],
                [5, 0, 15, 0, 15, 10, 5, 10]
            ],
            FILL_RULE.EVEN_ODD
        );

        expect(getAreas(result)).toEqual([50, 50]);
    });

    it('gives holes the opposite orientation of their boundary', () => {
        const [first, second]: Polyline[] = resolveContours(
            [
                [0, 0, 10, 0, 10, 10, 0, 10],
                [2, 2, 8, 2, 8, 8, 2, 8]
            ],
            FILL_RULE.EVEN_ODD
        );

        expect(Math.sign(signedArea(first))).toBe(-Math.sign(signedArea(second)));
    });

    it('ignores degenerate input', () => {
        expect(resolveContours([])).toEqual([]);
        expect(resolveContours([[0, 0, 5, 5]])).toEqual([]);
    });
});
