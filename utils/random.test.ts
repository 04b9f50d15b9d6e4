import { describe, it, expect } from 'vitest';
import { createRandom } from './random';

describe('createRandom', () => {
    it('should repeat the sequence for the same seed', () => {
        const a = createRandom(42);
        const b = createRandom(42);
        const seqA = Array.from({ length: 5 }, () => a.next());
        const seqB = Array.from({ length: 5 }, () => b.next());
        expect(seqA).toEqual(seqB);
    });

    it('should differ between seeds', () => {
        expect(createRandom(1).next()).not.toBe(createRandom(2).next());
    });

    it('should keep uniform draws inside the range', () => {
        const rng = createRandom(7);
        for (let i = 0; i < 200; i++) {
            const v = rng.uniform(2, 4);
            expect(v).toBeGreaterThanOrEqual(2);
            expect(v).toBeLessThan(4);
        }
    });

    it('should pick from the given items', () => {
        const rng = createRandom(3);
        const items = ['red', 'blue', 'white'];
        for (let i = 0; i < 50; i++) {
            expect(items).toContain(rng.pick(items));
        }
    });

    it('should centre gaussian draws on the mean', () => {
        const rng = createRandom(11);
        let sum = 0;
        const n = 4000;
        for (let i = 0; i < n; i++) sum += rng.gauss(10, 2);
        expect(sum / n).toBeGreaterThan(9.8);
        expect(sum / n).toBeLessThan(10.2);
    });
});
