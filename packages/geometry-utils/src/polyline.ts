import { IPoint } from '@svg-reveal/svg-parser';

import { Polyline } from './types';

export function getPolylineLength(polyline: Polyline): number {
    let length: number = 0;
    let i: number = 0;

    for (i = 2; i + 1 < polyline.length; i = i + 2) {
        length = length + Math.hypot(polyline[i] - polyline[i - 2], polyline[i + 1] - polyline[i - 1]);
    }

    return length;
}

/**
 * Prefix of the polyline covering `distance` units of arc length. The last point is
 * interpolated inside the segment the distance ends in.
 */
export function slicePolyline(polyline: Polyline, distance: number): Polyline {
    const result: Polyline = polyline.slice(0, 2);
    let remaining: number = distance;
    let i: number = 0;
    let segmentLength: number = 0;
    let ratio: number = 0;

    if (distance <= 0) {
        return result;
    }

    for (i = 2; i + 1 < polyline.length; i = i + 2) {
        segmentLength = Math.hypot(polyline[i] - polyline[i - 2], polyline[i + 1] - polyline[i - 1]);

        if (segmentLength >= remaining) {
            ratio = segmentLength === 0 ? 1 : remaining / segmentLength;
            result.push(
                polyline[i - 2] + (polyline[i] - polyline[i - 2]) * ratio,
                polyline[i - 1] + (polyline[i + 1] - polyline[i - 1]) * ratio
            );

            return result;
        }

        result.push(polyline[i], polyline[i + 1]);
        remaining = remaining - segmentLength;
    }

    return result;
}

export function getPointAtLength(polyline: Polyline, distance: number): IPoint {
    const prefix: Polyline = slicePolyline(polyline, distance);
    const size: number = prefix.length;

    return size < 2 ? { x: 0, y: 0 } : { x: prefix[size - 2], y: prefix[size - 1] };
}
