export { default as SVGParser } from './svg-parser';
export type { WarningLogger } from './svg-parser';
export { default as PathParser, parsePath } from './path-parser/path-parser';
export { default as PathWriter } from './path-parser/path-writer';
export { default as serializePath } from './path-parser/path-serializer';
export { default as arcToCubic, estimateArcError, getArcPieceCount } from './path-parser/arc-converter';
export { parseColor, resolveFill } from './color';
export {
    SvgRevealError,
    MalformedPathError,
    UnparseableColorError,
    InvalidDimensionError,
    DocumentLoadError
} from './errors';
export { DEFAULT_FILL, MISSING_FILL, TRANSPARENT, DEFAULT_VIEW_BOX, DEFAULT_ARC_TOLERANCE, DEFAULT_DOCUMENT_OPTIONS } from './constants';
export { PATH_COMMAND, SVG_TAG, SEGMENT_TYPE, PATH_ERROR_POLICY } from './types';
export type {
    IPoint,
    MoveToSegment,
    LineToSegment,
    CubicSegment,
    QuadraticSegment,
    ArcSegment,
    ClosePathSegment,
    DrawSegment,
    Segment,
    SubPath,
    RGBA,
    ViewBox,
    ParseOptions,
    DocumentOptions,
    ParsedShape,
    LoadIssue,
    ParsedDocument
} from './types';

