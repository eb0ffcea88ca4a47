import { DEFAULT_ARC_TOLERANCE } from '../constants';
import { clonePoint } from '../helpers';
import { IPoint, SEGMENT_TYPE, Segment, SubPath } from '../types';
import arcToCubic from './arc-converter';

/**
 * Accumulates absolute segments into subpaths. Keeps the current point and the
 * start of the current subpath so callers only pass end and control points.
 */
export default class PathWriter {
    #subPaths: SubPath[] = [];

    #current: SubPath | null = null;

    #point: IPoint = { x: 0, y: 0 };

    #start: IPoint = { x: 0, y: 0 };

    #arcTolerance: number;

    public constructor(arcTolerance: number = DEFAULT_ARC_TOLERANCE) {
        this.#arcTolerance = arcTolerance;
    }

    public get point(): IPoint {
        return clonePoint(this.#point);
    }

    public get lastSegment(): Segment | null {
        if (this.#current === null) {
            return null;
        }

        const segments: Segment[] = this.#current.segments;

        return segments[segments.length - 1];
    }

    public moveTo(to: IPoint): this {
        this.#current = { segments: [{ type: SEGMENT_TYPE.MOVE_TO, to: clonePoint(to) }], closed: false };
        this.#subPaths.push(this.#current);
        this.#point = clonePoint(to);
        this.#start = clonePoint(to);

        return this;
    }

    public lineTo(to: IPoint): this {
        return this.push({ type: SEGMENT_TYPE.LINE_TO, from: this.point, to: clonePoint(to) }, to);
    }

    public cubicTo(control1: IPoint, control2: IPoint, to: IPoint): this {
        return this.push(
            {
                type: SEGMENT_TYPE.CUBIC,
                from: this.point,
                control1: clonePoint(control1),
                control2: clonePoint(control2),
                to: clonePoint(to)
            },
            to
        );
    }

    public quadraticTo(control: IPoint, to: IPoint): this {
        return this.push(
            { type: SEGMENT_TYPE.QUADRATIC, from: this.point, control: clonePoint(control), to: clonePoint(to) },
            to
        );
    }

    public arcTo(rx: number, ry: number, rotation: number, largeArc: boolean, sweep: boolean, to: IPoint): this {
        const from: IPoint = this.point;

        if (from.x === to.x && from.y === to.y) {
            return this;
        }

        if (rx === 0 || ry === 0) {
            return this.lineTo(to);
        }

        const radiusX: number = Math.abs(rx);
        const radiusY: number = Math.abs(ry);

        return this.push(
            {
                type: SEGMENT_TYPE.ARC,
                from,
                to: clonePoint(to),
                rx: radiusX,
                ry: radiusY,
                rotation,
                largeArc,
                sweep,
                curves: arcToCubic({ from, to, rx: radiusX, ry: radiusY, rotation, largeArc, sweep }, this.#arcTolerance)
            },
            to
        );
    }

    public close(): this {
        if (this.#current === null) {
            return this;
        }

        this.#current.segments.push({ type: SEGMENT_TYPE.CLOSE, from: this.point, to: clonePoint(this.#start) });
        this.#current.closed = true;
        this.#point = clonePoint(this.#start);

        return this;
    }

    public getResult(): SubPath[] {
        return this.#subPaths;
    }

    private push(segment: Segment, to: IPoint): this {
        // a drawing command right after a close starts a new subpath at the closed subpath's start
        if (this.#current === null || this.#current.closed) {
            this.moveTo(this.#point);
        }

        this.#current?.segments.push(segment);
        this.#point = clonePoint(to);

        return this;
    }
}
