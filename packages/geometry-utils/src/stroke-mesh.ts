import { TOL } from './constants';
import { mergeMeshes } from './tessellator';
import { Mesh, Polyline } from './types';

/**
 * One quad of `width` thickness per polyline segment, centred on the segment.
 * Joins are left open.
 */
export function buildStrokeMesh(polylines: Polyline[], width: number): Mesh {
    const halfWidth: number = width * 0.5;
    const coords: Polyline = [];
    const indices: number[] = [];
    let i: number = 0;
    let base: number = 0;
    let x0: number = 0;
    let y0: number = 0;
    let x1: number = 0;
    let y1: number = 0;
    let length: number = 0;
    let nx: number = 0;
    let ny: number = 0;

    polylines.forEach(polyline => {
        for (i = 2; i + 1 < polyline.length; i = i + 2) {
            x0 = polyline[i - 2];
            y0 = polyline[i - 1];
            x1 = polyline[i];
            y1 = polyline[i + 1];
            length = Math.hypot(x1 - x0, y1 - y0);

            if (length < TOL) {
                continue;
            }

            nx = (-(y1 - y0) / length) * halfWidth;
            ny = ((x1 - x0) / length) * halfWidth;
            base = coords.length >> 1;

            coords.push(x0 + nx, y0 + ny, x0 - nx, y0 - ny, x1 - nx, y1 - ny, x1 + nx, y1 + ny);
            indices.push(base, base + 1, base + 2, base, base + 2, base + 3);
        }
    });

    return mergeMeshes([{ coords, indices }]);
}
