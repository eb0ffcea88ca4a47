/// <reference path="./typings/js-clipper.d.ts" />
import ClipperLib from 'js-clipper';

import { FILL_RULE, Polyline } from './types';

const CLIPPER_SCALE: number = 10000;

const FILL_TYPES: Record<FILL_RULE, ClipperLib.PolyFillType> = {
    [FILL_RULE.NON_ZERO]: ClipperLib.PolyFillType.pftNonZero,
    [FILL_RULE.EVEN_ODD]: ClipperLib.PolyFillType.pftEvenOdd
};

function toClipper(contour: Polyline): ClipperLib.IntPoint[] {
    const pointCount: number = contour.length >> 1;
    const result: ClipperLib.IntPoint[] = [];
    let i: number = 0;

    for (i = 0; i < pointCount; ++i) {
        result.push({
            X: Math.round(contour[i << 1] * CLIPPER_SCALE),
            Y: Math.round(contour[(i << 1) + 1] * CLIPPER_SCALE)
        });
    }

    return result;
}

function fromClipper(path: ClipperLib.IntPoint[]): Polyline {
    return path.reduce<Polyline>((result, point) => {
        result.push(point.X / CLIPPER_SCALE, point.Y / CLIPPER_SCALE);

        return result;
    }, []);
}

/**
 * Unions the contours of one path under `fillRule`. The result has no self
 * intersections and no overlaps: outer boundaries and holes alternate in
 * orientation, so they classify under nonzero alone.
 */
export function resolveContours(contours: Polyline[], fillRule: FILL_RULE = FILL_RULE.NON_ZERO): Polyline[] {
    const paths: ClipperLib.IntPoint[][] = contours.filter(contour => contour.length >= 6).map(toClipper);
    const solution: ClipperLib.IntPoint[][] = [];
    const fillType: ClipperLib.PolyFillType = FILL_TYPES[fillRule];
    let clipper: ClipperLib.Clipper;

    if (paths.length === 0) {
        return [];
    }

    clipper = new ClipperLib.Clipper();
    // split polygons that touch at a vertex
    clipper.StrictlySimple = true;
    clipper.AddPaths(paths, ClipperLib.PolyType.ptSubject, true);
    clipper.Execute(ClipperLib.ClipType.ctUnion, solution, fillType, fillType);

    return solution.map(fromClipper);
}
