import { describe, expect, it } from '@jest/globals';
import { parsePath } from '@svg-reveal/svg-parser';

import { polygonArea } from '../bounding-box';
import { tessellate, tessellateFill } from '../tessellator';
import { FILL_RULE, Mesh } from '../types';

const SQUARE_WITH_REVERSED_HOLE: string = 'M0 0 L10 0 L10 10 L0 10 Z M2 2 L2 8 L8 8 L8 2 Z';
const SQUARE_WITH_SAME_DIRECTION_HOLE: string = 'M0 0 L10 0 L10 10 L0 10 Z M2 2 L8 2 L8 8 L2 8 Z';
const BOWTIE: string = 'M0,0 L10,10 L10,0 L0,10 Z';
const DOUBLE_WOUND_SQUARE: string = 'M0 0 L20 0 L20 20 L0 20 L0 0 L5 5 L15 5 L15 15 L5 15 L5 5 Z';
const PENTAGRAM: string = 'M50,0 L79,90 L2,35 L98,35 L21,90 Z';

function getArea({ vertices, indices }: Mesh): number {
    return polygonArea(vertices, indices);
}

describe('tessellate', () => {
    it('triangulates a closed rectangle into two triangles', () => {
        const [subPath] = parsePath('M0 0 L10 0 L10 10 L0 10 Z');
        const mesh: Mesh = tessellate(subPath);

        expect(mesh.vertices).toHaveLength(8);
        expect(mesh.indices).toHaveLength(6);
        expect(getArea(mesh)).toBeCloseTo(100);
    });

    it('produces no triangles for fewer than three distinct points', () => {
        const [subPath] = parsePath('M0 0 L5 5 L5 5');
        const mesh: Mesh = tessellate(subPath);

        expect(mesh.vertices).toHaveLength(0);
        expect(mesh.indices).toHaveLength(0);
    });
});

describe('tessellateFill', () => {
    it('cuts a reversed inner contour out under nonzero', () => {
        const mesh: Mesh = tessellateFill(parsePath(SQUARE_WITH_REVERSED_HOLE));

        expect(mesh.vertices).toHaveLength(16);
        expect(getArea(mesh)).toBeCloseTo(64);
    });

    it('keeps a same direction inner contour filled under nonzero', () => {
        const mesh: Mesh = tessellateFill(parsePath(SQUARE_WITH_SAME_DIRECTION_HOLE), {
            fillRule: FILL_RULE.NON_ZERO
        });

        expect(getArea(mesh)).toBeCloseTo(100);
    });

    it('cuts any inner contour out under evenodd', () => {
        const mesh: Mesh = tessellateFill(parsePath(SQUARE_WITH_SAME_DIRECTION_HOLE), {
            fillRule: FILL_RULE.EVEN_ODD
        });

        expect(getArea(mesh)).toBeCloseTo(64);
    });

    it('fills an island inside a hole', () => {
        const mesh: Mesh = tessellateFill(parsePath(`${SQUARE_WITH_REVERSED_HOLE} M4 4 L6 4 L6 6 L4 6 Z`));

        expect(getArea(mesh)).toBeCloseTo(68);
    });

    it('merges disjoint contours', () => {
        const mesh: Mesh = tessellateFill(parsePath('M0 0 L2 0 L2 2 L0 2 Z M10 10 L13 10 L13 13 L10 13 Z'));

        expect(mesh.vertices).toHaveLength(16);
        expect(mesh.indices).toHaveLength(12);
        expect(getArea(mesh)).toBeCloseTo(13);
        expect(Math.min(...Array.from(mesh.indices.slice(6)))).toBe(4);
    });

    it('approximates a circle', () => {
        const circle: string =
            'M20 10 A10 10 0 0 1 10 20 A10 10 0 0 1 0 10 A10 10 0 0 1 10 0 A10 10 0 0 1 20 10 Z';

        expect(getArea(tessellateFill(parsePath(circle)))).toBeCloseTo(Math.PI * 100, -1);
    });

    it('fills both lobes of a self intersecting contour', () => {
        expect(getArea(tessellateFill(parsePath(BOWTIE), { fillRule: FILL_RULE.NON_ZERO }))).toBeCloseTo(50);
        expect(getArea(tessellateFill(parsePath(BOWTIE), { fillRule: FILL_RULE.EVEN_ODD }))).toBeCloseTo(50);
    });

    it('follows the fill rule inside a contour that winds twice', () => {
        const subPaths = parsePath(DOUBLE_WOUND_SQUARE);

        expect(getArea(tessellateFill(subPaths, { fillRule: FILL_RULE.NON_ZERO }))).toBeCloseTo(400);
        expect(getArea(tessellateFill(subPaths, { fillRule: FILL_RULE.EVEN_ODD }))).toBeCloseTo(300);
    });

    it('leaves the centre of a pentagram empty only under evenodd', () => {
        const subPaths = parsePath(PENTAGRAM);
        const nonZero: number = getArea(tessellateFill(subPaths, { fillRule: FILL_RULE.NON_ZERO }));
        const evenOdd: number = getArea(tessellateFill(subPaths, { fillRule: FILL_RULE.EVEN_ODD }));

        expect(evenOdd).toBeGreaterThan(0);
        expect(nonZero).toBeGreaterThan(evenOdd + 100);
    });

    it('returns an empty mesh for lines', () => {
        expect(tessellateFill(parsePath('M0 0 L5 5')).indices).toHaveLength(0);
        expect(tessellateFill([]).vertices).toHaveLength(0);
    });
});
