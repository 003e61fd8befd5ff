import { describe, it, expect } from '@jest/globals';
import { haversineDistanceKm, EARTH_RADIUS_KM } from '../../src/utils/geo';

describe('haversineDistanceKm', () => {
    it('is exactly zero for identical points', () => {
        expect(haversineDistanceKm(40.7128, -74.006, 40.7128, -74.006)).toBe(0);
    });

    it('is symmetric', () => {
        const there = haversineDistanceKm(36.0788, -81.1781, 36.011293, -82.048315);
        const back = haversineDistanceKm(36.011293, -82.048315, 36.0788, -81.1781);
        expect(there).toBe(back);
        expect(there).toBeGreaterThan(0);
    });

    it('measures one degree of latitude along a meridian', () => {
        expect(haversineDistanceKm(40, -75, 41, -75)).toBeCloseTo(EARTH_RADIUS_KM * Math.PI / 180, 9);
    });

    it('measures half the circumference between antipodes on the equator', () => {
        expect(haversineDistanceKm(0, 0, 0, 180)).toBeCloseTo(EARTH_RADIUS_KM * Math.PI, 6);
    });

    it('propagates NaN inputs', () => {
        expect(haversineDistanceKm(Number.NaN, 0, 0, 0)).toBeNaN();
    });
});
