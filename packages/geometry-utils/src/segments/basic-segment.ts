import { IPoint } from '@svg-reveal/svg-parser';

import { MAX_SUBDIVISION_DEPTH } from '../constants';
import { IBasicSegmentData } from './types';

export default class BasicSegment {
    #points: IPoint[];

    #tolerance: number;

    #depth: number;

    protected constructor({ point1, point2 }: IBasicSegmentData, tolerance: number, depth: number) {
        this.#points = [point1, point2];
        this.#tolerance = tolerance;
        this.#depth = depth;
    }

    protected get point1(): IPoint {
        return this.#points[0];
    }

    protected get point2(): IPoint {
        return this.#points[1];
    }

    protected get tolerance(): number {
        return this.#tolerance;
    }

    protected get depth(): number {
        return this.#depth;
    }

    protected get isFlat(): boolean {
        return true;
    }

    protected subdivide(): BasicSegment[] {
        return [];
    }

    // point of the curve at parameter t
    protected getPoint(t: number): IPoint {
        return {
            x: this.point1.x + (this.point2.x - this.point1.x) * t,
            y: this.point1.y + (this.point2.y - this.point1.y) * t
        };
    }

    protected static getMidPoint(point1: IPoint, point2: IPoint): IPoint {
        return {
            x: (point1.x + point2.x) * 0.5,
            y: (point1.y + point2.y) * 0.5
        };
    }

    protected static linearizeCurve(instance: BasicSegment): number[] {
        const result: number[] = [];
        const todo: BasicSegment[] = [instance];
        let segment: BasicSegment;

        // recursion could stack overflow, loop instead
        while (todo.length > 0) {
            segment = todo[0];

            if (segment.isFlat || segment.depth >= MAX_SUBDIVISION_DEPTH) {
                result.push(segment.point2.x, segment.point2.y);
                todo.shift();
            } else {
                todo.splice(0, 1, ...segment.subdivide());
            }
        }

        return result;
    }

    // equal parameter steps, the end point is always exact
    protected static sampleCurve(instance: BasicSegment, resolution: number): number[] {
        const stepCount: number = Math.max(Math.round(resolution), 1);
        const result: number[] = [];
        let i: number = 0;
        let point: IPoint;

        for (i = 1; i < stepCount; ++i) {
            point = instance.getPoint(i / stepCount);
            result.push(point.x, point.y);
        }

        result.push(instance.point2.x, instance.point2.y);

        return result;
    }
}
