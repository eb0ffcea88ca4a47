import { CubicSegment as CubicCurve, DrawSegment, SEGMENT_TYPE, Segment, SubPath } from '@svg-reveal/svg-parser';

import { DEFAULT_RESOLUTION, TOL } from './constants';
import { CubicSegment, QuadraticSegment } from './segments';
import { FlattenOptions, Polyline } from './types';

function flattenCubic(curve: CubicCurve, { resolution, tolerance }: FlattenOptions): number[] {
    const data = { point1: curve.from, point2: curve.to, control1: curve.control1, control2: curve.control2 };

    return tolerance === undefined ? CubicSegment.sample(data, resolution) : CubicSegment.linearize(data, tolerance);
}

/**
 * Points of a drawing segment after its start point, ending with its end point.
 * Arcs are flattened through their cubic pieces.
 */
export function flattenSegment(segment: DrawSegment, options: Partial<FlattenOptions> = {}): Polyline {
    const config: FlattenOptions = { resolution: DEFAULT_RESOLUTION, ...options };

    switch (segment.type) {
        case SEGMENT_TYPE.CUBIC:
            return flattenCubic(segment, config);
        case SEGMENT_TYPE.QUADRATIC: {
            const data = { point1: segment.from, point2: segment.to, control: segment.control };

            return config.tolerance === undefined
                ? QuadraticSegment.sample(data, config.resolution)
                : QuadraticSegment.linearize(data, config.tolerance);
        }
        case SEGMENT_TYPE.ARC:
            return segment.curves.reduce<Polyline>((result, curve) => result.concat(flattenCubic(curve, config)), []);
        case SEGMENT_TYPE.LINE_TO:
        case SEGMENT_TYPE.CLOSE:
        default:
            return [segment.to.x, segment.to.y];
    }
}

function isSamePoint(x1: number, y1: number, x2: number, y2: number): boolean {
    return Math.abs(x1 - x2) < TOL && Math.abs(y1 - y2) < TOL;
}

// drops consecutive duplicates and a closing point equal to the first one
export function cleanPolyline(points: Polyline): Polyline {
    const result: Polyline = [];
    const pointCount: number = points.length >> 1;
    let i: number = 0;
    let x: number = 0;
    let y: number = 0;
    let size: number = 0;

    for (i = 0; i < pointCount; ++i) {
        x = points[i << 1];
        y = points[(i << 1) + 1];
        size = result.length;

        if (size === 0 || !isSamePoint(result[size - 2], result[size - 1], x, y)) {
            result.push(x, y);
        }
    }

    size = result.length;

    if (size > 4 && isSamePoint(result[0], result[1], result[size - 2], result[size - 1])) {
        result.length = size - 2;
    }

    return result;
}

export function flattenSubPath(subPath: SubPath, options: Partial<FlattenOptions> = {}): Polyline {
    const points: Polyline = [];
    const segments: Segment[] = subPath.segments;
    const segmentCount: number = segments.length;
    let i: number = 0;
    let segment: Segment;

    for (i = 0; i < segmentCount; ++i) {
        segment = segments[i];

        if (segment.type === SEGMENT_TYPE.MOVE_TO) {
            points.push(segment.to.x, segment.to.y);
        } else {
            points.push(...flattenSegment(segment, options));
        }
    }

    return cleanPolyline(points);
}
