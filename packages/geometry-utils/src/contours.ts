import { TOL } from './constants';
import { ContourGroup, FILL_RULE, Polyline } from './types';

// shoelace formula, positive for counter-clockwise contours in a y-up frame
export function signedArea(contour: Polyline): number {
    const pointCount: number = contour.length >> 1;
    let area: number = 0;
    let i: number = 0;
    let j: number = 0;

    for (i = 0; i < pointCount; ++i) {
        j = (i + 1) % pointCount;
        area = area + contour[i << 1] * contour[(j << 1) + 1] - contour[j << 1] * contour[(i << 1) + 1];
    }

    return area * 0.5;
}

// ray casting, points on the boundary may land on either side
export function pointInContour(x: number, y: number, contour: Polyline): boolean {
    const pointCount: number = contour.length >> 1;
    let inside: boolean = false;
    let i: number = 0;
    let j: number = pointCount - 1;
    let xi: number = 0;
    let yi: number = 0;
    let xj: number = 0;
    let yj: number = 0;

    for (i = 0; i < pointCount; j = i++) {
        xi = contour[i << 1];
        yi = contour[(i << 1) + 1];
        xj = contour[j << 1];
        yj = contour[(j << 1) + 1];

        if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
            inside = !inside;
        }
    }

    return inside;
}

function isFilled(winding: number, fillRule: FILL_RULE): boolean {
    return fillRule === FILL_RULE.EVEN_ODD ? Math.abs(winding) % 2 === 1 : winding !== 0;
}

/**
 * Splits contours into outer boundaries with their holes. The winding number just
 * outside a contour is the sum of the orientations of the larger contours that
 * contain it; crossing the contour adds its own orientation. Contours that do
 * not change the fill state are dropped.
 */
export function groupContours(contours: Polyline[], fillRule: FILL_RULE = FILL_RULE.NON_ZERO): ContourGroup[] {
    const valid: Polyline[] = contours.filter(contour => contour.length >= 6 && Math.abs(signedArea(contour)) > TOL);
    const areas: number[] = valid.map(signedArea);
    const absAreas: number[] = areas.map(Math.abs);
    const contourCount: number = valid.length;
    const outers: number[] = [];
    const holes: number[] = [];
    let i: number = 0;
    let j: number = 0;
    let windingOut: number = 0;
    let windingIn: number = 0;

    for (i = 0; i < contourCount; ++i) {
        windingOut = 0;

        for (j = 0; j < contourCount; ++j) {
            if (i !== j && absAreas[j] > absAreas[i] && pointInContour(valid[i][0], valid[i][1], valid[j])) {
                windingOut = windingOut + Math.sign(areas[j]);
            }
        }

        windingIn = windingOut + Math.sign(areas[i]);

        if (!isFilled(windingOut, fillRule) && isFilled(windingIn, fillRule)) {
            outers.push(i);
        } else if (isFilled(windingOut, fillRule) && !isFilled(windingIn, fillRule)) {
            holes.push(i);
        }
    }

    const groups: ContourGroup[] = outers.map(index => ({ outer: valid[index], holes: [] }));

    holes.forEach(holeIndex => {
        let bestGroup: number = -1;
        let bestArea: number = Infinity;

        outers.forEach((outerIndex, groupIndex) => {
            if (
                absAreas[outerIndex] > absAreas[holeIndex] &&
                absAreas[outerIndex] < bestArea &&
                pointInContour(valid[holeIndex][0], valid[holeIndex][1], valid[outerIndex])
            ) {
                bestGroup = groupIndex;
                bestArea = absAreas[outerIndex];
            }
        });

        if (bestGroup !== -1) {
            groups[bestGroup].holes.push(valid[holeIndex]);
        }
    });

    return groups;
}
