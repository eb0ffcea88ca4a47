import earcut from 'earcut';
import { SubPath } from '@svg-reveal/svg-parser';

import { DEFAULT_FILL_OPTIONS, DEFAULT_RESOLUTION } from './constants';
import { resolveContours } from './contour-resolver';
import { groupContours } from './contours';
import { flattenSubPath } from './flatten';
import { ContourGroup, FILL_RULE, FillOptions, Mesh, Polyline } from './types';

export function createEmptyMesh(): Mesh {
    return { vertices: new Float32Array(0), indices: new Uint32Array(0) };
}

function triangulateGroup({ outer, holes }: ContourGroup): { coords: Polyline; indices: number[] } {
    const coords: Polyline = outer.slice();
    const holeIndices: number[] = [];

    holes.forEach(hole => {
        holeIndices.push(coords.length >> 1);
        coords.push(...hole);
    });

    return { coords, indices: earcut(coords, holeIndices.length !== 0 ? holeIndices : undefined) };
}

export function mergeMeshes(parts: { coords: Polyline; indices: number[] }[]): Mesh {
    const vertexSize: number = parts.reduce((result, part) => result + part.coords.length, 0);
    const indexSize: number = parts.reduce((result, part) => result + part.indices.length, 0);
    const vertices: Float32Array = new Float32Array(vertexSize);
    const indices: Uint32Array = new Uint32Array(indexSize);
    let vertexOffset: number = 0;
    let indexOffset: number = 0;
    let i: number = 0;

    parts.forEach(({ coords, indices: partIndices }) => {
        vertices.set(coords, vertexOffset);

        for (i = 0; i < partIndices.length; ++i) {
            indices[indexOffset + i] = partIndices[i] + (vertexOffset >> 1);
        }

        vertexOffset = vertexOffset + coords.length;
        indexOffset = indexOffset + partIndices.length;
    });

    return { vertices, indices };
}

// single contour triangulation, no hole handling
export function tessellate(subPath: SubPath, resolution: number = DEFAULT_RESOLUTION): Mesh {
    const contour: Polyline = flattenSubPath(subPath, { resolution });

    if (contour.length < 6) {
        return createEmptyMesh();
    }

    return mergeMeshes([{ coords: contour, indices: earcut(contour) }]);
}

/**
 * Triangulates every subpath of a path together. Self intersecting, overlapping
 * and nested contours are resolved under the fill rule before earcut runs.
 */
export function tessellateFill(subPaths: SubPath[], options: Partial<FillOptions> = {}): Mesh {
    const { fillRule, ...flattenOptions } = { ...DEFAULT_FILL_OPTIONS, ...options };
    const contours: Polyline[] = subPaths.map(subPath => flattenSubPath(subPath, flattenOptions));
    const groups: ContourGroup[] = groupContours(resolveContours(contours, fillRule), FILL_RULE.NON_ZERO);

    return groups.length === 0 ? createEmptyMesh() : mergeMeshes(groups.map(triangulateGroup));
}
