export interface Random {
    next: () => number;
    uniform: (min: number, max: number) => number;
    gauss: (mean: number, stdDev: number) => number;
    pick: <T>(items: readonly T[]) => T;
}

const mulberry32 = (seed: number) => {
    let t = seed >>> 0;
    return () => {
        t += 0x6d2b79f5;
        let r = Math.imul(t ^ (t >>> 15), 1 | t);
        r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
        return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
    };
};

/** Seeded generator so a scene redraws identically for the same inputs. */
export const createRandom = (seed: number): Random => {
    const next = mulberry32(seed);
    let spare: number | null = null;

    const standardNormal = () => {
        if (spare != null) {
            const value = spare;
            spare = null;
            return value;
        }
        let u = 0;
        let v = 0;
        while (u === 0) u = next();
        while (v === 0) v = next();
        const mag = Math.sqrt(-2.0 * Math.log(u));
        spare = mag * Math.sin(2 * Math.PI * v);
        return mag * Math.cos(2 * Math.PI * v);
    };

    return {
        next,
        uniform: (min, max) => min + (max - min) * next(),
        gauss: (mean, stdDev) => mean + stdDev * standardNormal(),
        pick: (items) => items[Math.floor(next() * items.length)],
    };
};
