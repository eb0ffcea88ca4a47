import { DocumentOptions, PATH_ERROR_POLICY, RGBA, ViewBox } from './types';

export const DEFAULT_FILL: RGBA = [1, 1, 1, 1];

// white with zero alpha, a path without a fill attribute stays unpainted
export const MISSING_FILL: RGBA = [1, 1, 1, 0];

export const TRANSPARENT: RGBA = [0, 0, 0, 0];

export const DEFAULT_VIEW_BOX: ViewBox = { x: 0, y: 0, width: 100, height: 100 };

export const DEFAULT_ARC_TOLERANCE: number = 0.1;

export const MAX_ARC_PIECES: number = 64;

export const DEFAULT_DOCUMENT_OPTIONS: DocumentOptions = {
    arcTolerance: DEFAULT_ARC_TOLERANCE,
    onPathError: PATH_ERROR_POLICY.SKIP
};
