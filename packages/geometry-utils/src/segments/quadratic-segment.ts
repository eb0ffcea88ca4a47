import { IPoint } from '@svg-reveal/svg-parser';

import BasicSegment from './basic-segment';
import { IQuadraticSegmentData } from './types';

export default class QuadraticSegment extends BasicSegment {
    #control: IPoint;

    protected constructor(config: IQuadraticSegmentData, tolerance: number, depth: number = 0) {
        super(config, tolerance, depth);
        this.#control = config.control;
    }

    protected get isFlat(): boolean {
        const ux: number = QuadraticSegment.getUniform(this.point1.x, this.point2.x, this.#control.x);
        const uy: number = QuadraticSegment.getUniform(this.point1.y, this.point2.y, this.#control.y);

        return ux + uy <= 4 * this.tolerance * this.tolerance;
    }

    protected subdivide(): BasicSegment[] {
        const mid1: IPoint = BasicSegment.getMidPoint(this.point1, this.#control);
        const mid2: IPoint = BasicSegment.getMidPoint(this.#control, this.point2);
        const mid3: IPoint = BasicSegment.getMidPoint(mid1, mid2);
        const depth: number = this.depth + 1;

        return [
            new QuadraticSegment({ point1: this.point1, point2: mid3, control: mid1 }, this.tolerance, depth),
            new QuadraticSegment({ point1: mid3, point2: this.point2, control: mid2 }, this.tolerance, depth)
        ];
    }

    protected getPoint(t: number): IPoint {
        const u: number = 1 - t;

        return {
            x: u * u * this.point1.x + 2 * u * t * this.#control.x + t * t * this.point2.x,
            y: u * u * this.point1.y + 2 * u * t * this.#control.y + t * t * this.point2.y
        };
    }

    private static getUniform(point1: number, point2: number, control: number): number {
        const uniform: number = 2 * control - point1 - point2;

        return uniform * uniform;
    }

    public static linearize(data: IQuadraticSegmentData, tolerance: number): number[] {
        return BasicSegment.linearizeCurve(new QuadraticSegment(data, tolerance));
    }

    public static sample(data: IQuadraticSegmentData, resolution: number): number[] {
        return BasicSegment.sampleCurve(new QuadraticSegment(data, 0), resolution);
    }
}
