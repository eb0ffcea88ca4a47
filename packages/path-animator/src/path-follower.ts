import { IPoint } from '@svg-reveal/svg-parser';
import { Polyline, getPointAtLength, getPolylineLength } from '@svg-reveal/geometry-utils';

import { ROTATION_STEP } from './constants';
import PathModel from './path-model';

/**
 * Arc length parameterisation of a path. Subpath gaps are skipped, so travel
 * jumps from one subpath's end to the next one's start.
 */
export default class PathFollower {
    #pieces: Polyline[];

    #lengths: number[];

    #length: number;

    public constructor(model: PathModel) {
        this.#pieces = model.strokeSegments.filter(piece => piece.length >= 2);
        this.#lengths = this.#pieces.map(getPolylineLength);
        this.#length = this.#lengths.reduce((result, length) => result + length, 0);
    }

    public get length(): number {
        return this.#length;
    }

    public pointAt(fraction: number): IPoint {
        const pieceCount: number = this.#pieces.length;
        let remaining: number = Math.min(Math.max(fraction, 0), 1) * this.#length;
        let i: number = 0;

        if (pieceCount === 0) {
            return { x: 0, y: 0 };
        }

        for (i = 0; i < pieceCount; ++i) {
            if (remaining <= this.#lengths[i] || i === pieceCount - 1) {
                return getPointAtLength(this.#pieces[i], remaining);
            }

            remaining = remaining - this.#lengths[i];
        }

        return getPointAtLength(this.#pieces[pieceCount - 1], this.#lengths[pieceCount - 1]);
    }

    // direction of travel in degrees; at the very end the last step before it is used
    public angleAt(fraction: number, step: number = ROTATION_STEP): number {
        const from: number = Math.min(Math.max(fraction, 0), 1);
        const to: number = Math.min(from + step, 1);
        const start: IPoint = from === to ? this.pointAt(Math.max(from - step, 0)) : this.pointAt(from);
        const end: IPoint = this.pointAt(to);

        return (Math.atan2(end.y - start.y, end.x - start.x) * 180) / Math.PI;
    }
}
