import { describe, expect, it } from '@jest/globals';

import { computeProgress, isEasing, resolveEasing } from '../easing';
import { ConfigurationError } from '../errors';
import { EASING } from '../types';

describe('computeProgress', () => {
    it('starts at 0 and ends at 1 for every easing', () => {
        Object.values(EASING).forEach(name => {
            const easing = resolveEasing(name);

            expect(computeProgress(0, 0.3, easing)).toBe(0);
            expect(computeProgress(0.3, 0.3, easing)).toBe(1);
        });
    });

    it('treats a zero duration as finished', () => {
        expect(computeProgress(0, 0, resolveEasing(EASING.LINEAR))).toBe(1);
    });

    it('clamps time outside the phase', () => {
        const linear = resolveEasing(EASING.LINEAR);

        expect(computeProgress(-1, 2, linear)).toBe(0);
        expect(computeProgress(1, 2, linear)).toBe(0.5);
        expect(computeProgress(3, 2, linear)).toBe(1);
    });

    it('lets overshooting curves leave the unit range', () => {
        expect(computeProgress(0.2, 1, resolveEasing(EASING.IN_BACK))).toBeLessThan(0);
        expect(computeProgress(0.7, 1, resolveEasing(EASING.OUT_BACK))).toBeGreaterThan(1);
    });
});

describe('resolveEasing', () => {
    it('maps names to curves', () => {
        expect(resolveEasing(EASING.IN_QUAD)(0.5)).toBe(0.25);
        expect(resolveEasing(EASING.OUT_QUAD)(0.5)).toBe(0.75);
        expect(resolveEasing(EASING.IN_OUT_CUBIC)(0.25)).toBe(0.0625);
        expect(resolveEasing(EASING.OUT_SINE)(0.5)).toBeCloseTo(Math.SQRT1_2);
        expect(resolveEasing(EASING.OUT_BOUNCE)(1)).toBeCloseTo(1);
    });

    it('passes through the middle for symmetric curves', () => {
        [EASING.IN_OUT_QUAD, EASING.IN_OUT_QUINT, EASING.IN_OUT_CIRC, EASING.IN_OUT_EXPO].forEach(name => {
            expect(resolveEasing(name)(0.5)).toBeCloseTo(0.5);
        });
    });

    it('rejects unknown names', () => {
        expect(() => resolveEasing('wobble')).toThrow(ConfigurationError);
        expect(isEasing('out_sine')).toBe(true);
        expect(isEasing('wobble')).toBe(false);
    });
});
