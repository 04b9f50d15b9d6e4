import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { IDENTITY_VIEW, isNavigable, panBy, viewForMode, wheelFactor, zoomAt } from './view';

describe('View Transform', () => {
    let info: MockInstance<typeof console.info>;

    beforeEach(() => {
        info = vi.spyOn(console, 'info').mockImplementation(() => {});
    });

    afterEach(() => {
        info.mockRestore();
    });

    describe('viewForMode', () => {
        it('should only let the explorer navigate', () => {
            expect(isNavigable('explorer')).toBe(true);
            expect(isNavigable('stepper')).toBe(false);
        });

        it('should show the stepper unpanned and unzoomed', () => {
            const view = { zoom: 4, centerX: 30, centerY: -12 };
            expect(viewForMode('stepper', view)).toBe(IDENTITY_VIEW);
            expect(viewForMode('explorer', view)).toBe(view);
        });
    });

    describe('wheelFactor', () => {
        it('should zoom out on scroll down and in on scroll up', () => {
            expect(wheelFactor(120)).toBe(0.9);
            expect(wheelFactor(-120)).toBe(1.1);
            expect(wheelFactor(0)).toBeNull();
        });
    });

    describe('zoomAt', () => {
        it('should zoom about the centre by default', () => {
            expect(zoomAt(IDENTITY_VIEW, 1.1)).toEqual({ zoom: 1.1, centerX: 0, centerY: 0 });
        });

        it('should keep the point under the cursor fixed', () => {
            const view = zoomAt(IDENTITY_VIEW, 2, 100, 50);
            expect(view).toEqual({ zoom: 2, centerX: 50, centerY: -25 });
            // world point under the cursor, before and after
            expect(view.centerX + 100 / view.zoom).toBe(100);
            expect(view.centerY - 50 / view.zoom).toBe(-50);
        });

        it('should refuse to zoom past the upper limit', () => {
            const view = { zoom: 95, centerX: 3, centerY: 4 };
            expect(zoomAt(view, 1.1)).toBe(view);
            expect(info).toHaveBeenCalledWith('[zoom] limit reached: 104.50');
        });

        it('should refuse to zoom past the lower limit', () => {
            const view = { zoom: 0.0105, centerX: 0, centerY: 0 };
            expect(zoomAt(view, 0.9)).toBe(view);
            expect(info).toHaveBeenCalledTimes(1);
        });
    });

    describe('panBy', () => {
        it('should move the centre against the drag', () => {
            expect(panBy(IDENTITY_VIEW, 10, 20)).toEqual({ zoom: 1, centerX: -10, centerY: 20 });
        });

        it('should scale the drag by the zoom', () => {
            expect(panBy({ zoom: 2, centerX: 0, centerY: 0 }, 10, 20)).toEqual({ zoom: 2, centerX: -5, centerY: 10 });
        });

        it('should ignore non-finite deltas', () => {
            expect(panBy(IDENTITY_VIEW, NaN, 5)).toBe(IDENTITY_VIEW);
        });
    });
});
