import { describe, it, expect } from 'vitest';
import { COMMON_RANGES, isInRange, parseUnit, unitSystem } from '../units';

describe('unit system', () => {
    it('maps each family to its query code and block', () => {
        expect(unitSystem('metric').queryCode).toBe('m');
        expect(unitSystem('metric').block).toBe('metric');
        expect(unitSystem('imperial').queryCode).toBe('e');
        expect(unitSystem('imperial').block).toBe('imperial');
    });

    it('uses scale-specific ranges for temperature', () => {
        expect(unitSystem('metric').ranges.temp).toEqual({ min: -100, max: 100 });
        expect(unitSystem('imperial').ranges.temp).toEqual({ min: -148, max: 212 });
    });

    it('parses codes and names, case-insensitively', () => {
        expect(parseUnit('m')).toBe('metric');
        expect(parseUnit(' Metric ')).toBe('metric');
        expect(parseUnit('E')).toBe('imperial');
        expect(parseUnit('imperial')).toBe('imperial');
        expect(parseUnit('h')).toBeNull();
        expect(parseUnit('')).toBeNull();
    });

    it('treats range bounds as inclusive', () => {
        expect(isInRange(0, COMMON_RANGES.humidity)).toBe(true);
        expect(isInRange(100, COMMON_RANGES.humidity)).toBe(true);
        expect(isInRange(100.01, COMMON_RANGES.humidity)).toBe(false);
        expect(isInRange(-0.01, COMMON_RANGES.humidity)).toBe(false);
    });
});
