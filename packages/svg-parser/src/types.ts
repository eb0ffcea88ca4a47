import type { SvgRevealError } from './errors';

export enum PATH_COMMAND {
    M = 'M',
    L = 'L',
    H = 'H',
    V = 'V',
    C = 'C',
    S = 'S',
    Q = 'Q',
    T = 'T',
    A = 'A',
    Z = 'Z'
}

export enum SVG_TAG {
    LINE = 'line',
    CIRCLE = 'circle',
    ELLIPSE = 'ellipse',
    PATH = 'path',
    POLYGON = 'polygon',
    POLYLINE = 'polyline',
    RECT = 'rect',
    G = 'g',
    SVG = 'svg',
    DEFS = 'defs',
    CLIP_PATH = 'clipPath',
    MASK = 'mask',
    SYMBOL = 'symbol',
    PATTERN = 'pattern',
    MARKER = 'marker'
}

export enum SEGMENT_TYPE {
    MOVE_TO = 'moveTo',
    LINE_TO = 'lineTo',
    CUBIC = 'cubicCurveTo',
    QUADRATIC = 'quadraticCurveTo',
    ARC = 'arcTo',
    CLOSE = 'closePath'
}

export enum PATH_ERROR_POLICY {
    SKIP = 'skip',
    ABORT = 'abort'
}

export interface IPoint {
    x: number;
    y: number;
}

export interface MoveToSegment {
    type: SEGMENT_TYPE.MOVE_TO;
    to: IPoint;
}

export interface LineToSegment {
    type: SEGMENT_TYPE.LINE_TO;
    from: IPoint;
    to: IPoint;
}

export interface CubicSegment {
    type: SEGMENT_TYPE.CUBIC;
    from: IPoint;
    control1: IPoint;
    control2: IPoint;
    to: IPoint;
}

export interface QuadraticSegment {
    type: SEGMENT_TYPE.QUADRATIC;
    from: IPoint;
    control: IPoint;
    to: IPoint;
}

export interface ArcSegment {
    type: SEGMENT_TYPE.ARC;
    from: IPoint;
    to: IPoint;
    rx: number;
    ry: number;
    rotation: number;
    largeArc: boolean;
    sweep: boolean;
    // cubic approximation, in drawing order
    curves: CubicSegment[];
}

export interface ClosePathSegment {
    type: SEGMENT_TYPE.CLOSE;
    from: IPoint;
    to: IPoint;
}

export type DrawSegment = LineToSegment | CubicSegment | QuadraticSegment | ArcSegment | ClosePathSegment;

export type Segment = MoveToSegment | DrawSegment;

export interface SubPath {
    segments: Segment[];
    closed: boolean;
}

export type RGBA = [number, number, number, number];

export interface ViewBox {
    x: number;
    y: number;
    width: number;
    height: number;
}

export type ParseOptions = {
    arcTolerance: number;
};

export type DocumentOptions = ParseOptions & {
    onPathError: PATH_ERROR_POLICY;
};

export interface ParsedShape {
    id: string | null;
    index: number;
    tag: SVG_TAG;
    subPaths: SubPath[];
    fill: RGBA;
}

export interface LoadIssue {
    index: number;
    id: string | null;
    error: SvgRevealError;
}

export interface ParsedDocument {
    viewBox: ViewBox;
    shapes: ParsedShape[];
    issues: LoadIssue[];
}
