import { INode } from 'svgson';

import { IPoint } from './types';

export function degreesToRadians(value: number): number {
    return (value * Math.PI) / 180;
}

export function clonePoint(point: IPoint): IPoint {
    return { x: point.x, y: point.y };
}

export function getFloatAttribute(element: INode, key: string): number {
    return parseFloat(element.attributes[key]) || 0;
}

export function getAttribute(element: INode, key: string): string | null {
    return Object.prototype.hasOwnProperty.call(element.attributes, key) ? element.attributes[key] : null;
}

export function parsePointList(value: string): IPoint[] {
    // Split the string by whitespace, commas and newlines
    const coordinates: string[] = value.trim().split(/[\s,]+/);
    const coordinateCount: number = coordinates.length;
    const points: IPoint[] = [];
    let i: number = 0;
    let x: number = 0;
    let y: number = 0;

    // Iterate over the array two items at a time
    for (i = 0; i + 1 < coordinateCount; i = i + 2) {
        x = parseFloat(coordinates[i]);
        y = parseFloat(coordinates[i + 1]);

        if (!isNaN(x) && !isNaN(y)) {
            points.push({ x, y });
        }
    }

    return points;
}
