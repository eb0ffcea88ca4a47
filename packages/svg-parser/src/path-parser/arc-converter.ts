import { MAX_ARC_PIECES } from '../constants';
import { clonePoint, degreesToRadians } from '../helpers';
import { CubicSegment, IPoint, SEGMENT_TYPE } from '../types';

interface ArcCenterConfig {
    center: IPoint;
    radius: IPoint;
    angle: number;
    theta: number;
    extent: number;
}

export interface ArcParameters {
    from: IPoint;
    to: IPoint;
    rx: number;
    ry: number;
    rotation: number;
    largeArc: boolean;
    sweep: boolean;
}

function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
    const length: number = Math.sqrt((ux * ux + uy * uy) * (vx * vx + vy * vy));
    const cos: number = Math.min(Math.max((ux * vx + uy * vy) / length, -1), 1);
    const sign: number = ux * vy - uy * vx < 0 ? -1 : 1;

    return sign * Math.acos(cos);
}

// endpoint to center parameterization, radii are scaled up when they cannot span the endpoints
function toCenter({ from, to, rx, ry, rotation, largeArc, sweep }: ArcParameters): ArcCenterConfig {
    const angle: number = degreesToRadians(rotation % 360);
    const cos: number = Math.cos(angle);
    const sin: number = Math.sin(angle);
    const diff: IPoint = { x: 0.5 * (from.x - to.x), y: 0.5 * (from.y - to.y) };
    const current: IPoint = {
        x: cos * diff.x + sin * diff.y,
        y: -sin * diff.x + cos * diff.y
    };
    const radius: IPoint = { x: Math.abs(rx), y: Math.abs(ry) };
    const radialCheck: number =
        (current.x * current.x) / (radius.x * radius.x) + (current.y * current.y) / (radius.y * radius.y);

    if (radialCheck > 1) {
        const radialSqrt: number = Math.sqrt(radialCheck);

        radius.x = radialSqrt * radius.x;
        radius.y = radialSqrt * radius.y;
    }

    const squareX: number = radius.x * radius.x;
    const squareY: number = radius.y * radius.y;
    const numerator: number = squareX * squareY - squareX * current.y * current.y - squareY * current.x * current.x;
    const denominator: number = squareX * current.y * current.y + squareY * current.x * current.x;
    const coef: number = (largeArc !== sweep ? 1 : -1) * Math.sqrt(Math.max(numerator / denominator, 0));
    const centerPrime: IPoint = {
        x: (coef * radius.x * current.y) / radius.y,
        y: (-coef * radius.y * current.x) / radius.x
    };
    const center: IPoint = {
        x: cos * centerPrime.x - sin * centerPrime.y + 0.5 * (from.x + to.x),
        y: sin * centerPrime.x + cos * centerPrime.y + 0.5 * (from.y + to.y)
    };
    const ux: number = (current.x - centerPrime.x) / radius.x;
    const uy: number = (current.y - centerPrime.y) / radius.y;
    const vx: number = (-current.x - centerPrime.x) / radius.x;
    const vy: number = (-current.y - centerPrime.y) / radius.y;
    const theta: number = vectorAngle(1, 0, ux, uy);
    let extent: number = vectorAngle(ux, uy, vx, vy);

    if (!sweep && extent > 0) {
        extent = extent - 2 * Math.PI;
    } else if (sweep && extent < 0) {
        extent = extent + 2 * Math.PI;
    }

    return { center, radius, angle, theta, extent };
}

function getArcPoint({ center, radius, angle }: ArcCenterConfig, theta: number): IPoint {
    const cos: number = Math.cos(angle);
    const sin: number = Math.sin(angle);
    const thetaCos: number = Math.cos(theta);
    const thetaSin: number = Math.sin(theta);

    return {
        x: center.x + cos * radius.x * thetaCos - sin * radius.y * thetaSin,
        y: center.y + sin * radius.x * thetaCos + cos * radius.y * thetaSin
    };
}

function getArcDerivative({ radius, angle }: ArcCenterConfig, theta: number): IPoint {
    const cos: number = Math.cos(angle);
    const sin: number = Math.sin(angle);
    const thetaCos: number = Math.cos(theta);
    const thetaSin: number = Math.sin(theta);

    return {
        x: -cos * radius.x * thetaSin - sin * radius.y * thetaCos,
        y: -sin * radius.x * thetaSin + cos * radius.y * thetaCos
    };
}

// upper bound of the radial error of one cubic piece spanning `sweep` radians
export function estimateArcError(radius: number, sweep: number): number {
    const quarter: number = Math.abs(sweep) / 4;
    const cos: number = Math.cos(quarter);

    return (radius * 4 * Math.pow(Math.sin(quarter), 6)) / (27 * cos * cos);
}

export function getArcPieceCount(radius: number, extent: number, tolerance: number): number {
    let count: number = Math.max(Math.ceil(Math.abs(extent) / (0.5 * Math.PI) - 1e-9), 1);

    while (count < MAX_ARC_PIECES && estimateArcError(radius, extent / count) > tolerance) {
        ++count;
    }

    return count;
}

/**
 * Approximates an SVG elliptical arc with cubic Bezier pieces of at most 90 degrees,
 * refined until every piece is within `tolerance`. Returns an empty list for
 * coincident endpoints; zero radii are the caller's business (the arc is a line).
 */
export default function arcToCubic(parameters: ArcParameters, tolerance: number): CubicSegment[] {
    const { from, to } = parameters;

    if (from.x === to.x && from.y === to.y) {
        return [];
    }

    const config: ArcCenterConfig = toCenter(parameters);
    const count: number = getArcPieceCount(Math.max(config.radius.x, config.radius.y), config.extent, tolerance);
    const step: number = config.extent / count;
    const handle: number = (4 / 3) * Math.tan(step / 4);
    const result: CubicSegment[] = [];
    let start: IPoint = clonePoint(from);
    let end: IPoint = start;
    let theta: number = config.theta;
    let derivative1: IPoint = getArcDerivative(config, theta);
    let derivative2: IPoint = derivative1;
    let i: number = 0;

    for (i = 0; i < count; ++i) {
        theta = config.theta + (i + 1) * step;
        end = i === count - 1 ? clonePoint(to) : getArcPoint(config, theta);
        derivative2 = getArcDerivative(config, theta);

        result.push({
            type: SEGMENT_TYPE.CUBIC,
            from: start,
            control1: { x: start.x + handle * derivative1.x, y: start.y + handle * derivative1.y },
            control2: { x: end.x - handle * derivative2.x, y: end.y - handle * derivative2.y },
            to: end
        });

        start = clonePoint(end);
        derivative1 = derivative2;
    }

    return result;
}
