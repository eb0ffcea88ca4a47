import { DEFAULT_FILL, MISSING_FILL, TRANSPARENT } from './constants';
import { UnparseableColorError } from './errors';
import { RGBA } from './types';

const HEX_COLOR: RegExp = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Parses `#rgb`, `#rgba`, `#rrggbb` and `#rrggbbaa` into normalized RGBA.
 * Anything else (named colors, `url(#gradient)`, `rgb()`) is rejected.
 */
export function parseColor(value: string): RGBA {
    const match: RegExpExecArray | null = HEX_COLOR.exec(value.trim());

    if (match === null) {
        throw new UnparseableColorError(value);
    }

    let digits: string = match[1];

    if (digits.length <= 4) {
        digits = digits
            .split('')
            .map(digit => digit + digit)
            .join('');
    }

    const channel = (index: number): number => parseInt(digits.slice(index << 1, (index << 1) + 2), 16) / 255;

    return [channel(0), channel(1), channel(2), digits.length === 8 ? channel(3) : 1];
}

export type FillResolution = {
    color: RGBA;
    error: UnparseableColorError | null;
};

// a missing fill is unpainted white, "none" is transparent, anything unreadable falls back to opaque white
export function resolveFill(value: string | null): FillResolution {
    if (value === null || value.trim() === '') {
        return { color: [...MISSING_FILL], error: null };
    }

    if (value.trim() === 'none') {
        return { color: [...TRANSPARENT], error: null };
    }

    try {
        return { color: parseColor(value), error: null };
    } catch (error) {
        if (error instanceof UnparseableColorError) {
            return { color: [...DEFAULT_FILL], error };
        }

        throw error;
    }
}
