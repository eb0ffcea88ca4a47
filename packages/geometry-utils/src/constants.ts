import { FILL_RULE, FillOptions } from './types';

export const TOL: number = Math.pow(10, -9);

export const DEFAULT_RESOLUTION: number = 16;

export const MAX_SUBDIVISION_DEPTH: number = 16;

export const DEFAULT_FILL_OPTIONS: FillOptions = {
    resolution: DEFAULT_RESOLUTION,
    fillRule: FILL_RULE.NON_ZERO
};
