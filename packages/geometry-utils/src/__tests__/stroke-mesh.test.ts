import { describe, expect, it } from '@jest/globals';

import { getBoundingBox } from '../bounding-box';
import { buildStrokeMesh } from '../stroke-mesh';

describe('buildStrokeMesh', () => {
    it('builds one quad per segment', () => {
        const mesh = buildStrokeMesh([[0, 0, 10, 0]], 2);

        expect(Array.from(mesh.vertices)).toEqual([0, 1, 0, -1, 10, -1, 10, 1]);
        expect(Array.from(mesh.indices)).toEqual([0, 1, 2, 0, 2, 3]);
    });

    it('offsets indices across polylines', () => {
        const mesh = buildStrokeMesh([[0, 0, 0, 4], [5, 5, 9, 5]], 1);

        expect(Array.from(mesh.indices.slice(6))).toEqual([4, 5, 6, 4, 6, 7]);
    });

    it('skips zero length segments', () => {
        expect(buildStrokeMesh([[3, 3, 3, 3], [1, 1]], 2).indices).toHaveLength(0);
    });
});

describe('getBoundingBox', () => {
    it('covers every point', () => {
        expect(getBoundingBox([1, 2, 5, -3, 2, 0])).toEqual({ x: 1, y: -3, width: 4, height: 5 });
    });

    it('is empty without points', () => {
        expect(getBoundingBox([])).toEqual({ x: 0, y: 0, width: 0, height: 0 });
    });
});
