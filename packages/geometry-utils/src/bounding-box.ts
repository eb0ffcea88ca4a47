import { BoundingBox } from './types';

export function getBoundingBox(points: ArrayLike<number>): BoundingBox {
    const size: number = points.length;
    let minX: number = Infinity;
    let minY: number = Infinity;
    let maxX: number = -Infinity;
    let maxY: number = -Infinity;
    let i: number = 0;

    if (size < 2) {
        return { x: 0, y: 0, width: 0, height: 0 };
    }

    for (i = 0; i + 1 < size; i = i + 2) {
        minX = Math.min(minX, points[i]);
        minY = Math.min(minY, points[i + 1]);
        maxX = Math.max(maxX, points[i]);
        maxY = Math.max(maxY, points[i + 1]);
    }

    return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

// total area covered by the triangles of a mesh
export function polygonArea(vertices: ArrayLike<number>, indices: ArrayLike<number>): number {
    let area: number = 0;
    let i: number = 0;
    let a: number = 0;
    let b: number = 0;
    let c: number = 0;

    for (i = 0; i + 2 < indices.length; i = i + 3) {
        a = indices[i] << 1;
        b = indices[i + 1] << 1;
        c = indices[i + 2] << 1;
        area =
            area +
            Math.abs(
                (vertices[b] - vertices[a]) * (vertices[c + 1] - vertices[a + 1]) -
                    (vertices[c] - vertices[a]) * (vertices[b + 1] - vertices[a + 1])
            ) *
                0.5;
    }

    return area;
}
