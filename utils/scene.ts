import type { CatalogEpoch, EpochDescriptor, ObjectKind, Scene, SceneObject, Viewport } from '../types';
import { COMOVING_OBJECT_COUNT } from '../constants';
import { createRandom, type Random } from './random';
import { renderClassOf } from './cosmology';

// --- CONSTANTS ---
const STEPPER_RADIUS_FRACTION = 0.9;
// Explorer scenes reach past the initial view so panning uncovers more.
const EXPLORER_RADIUS_FRACTION = 1.5;
const EARLY_GALAXY_CUTOFF_YEARS = 500e6;
const PRESENT_AGE_YEARS = 13.8e9;

// --- TYPES ---
export interface ComovingObject {
    radius: number; // comoving, in pixels at a = 1
    angle: number;
    kind: 'galaxy' | 'star';
}

export interface ComovingField {
    maxRadius: number;
    objects: ComovingObject[];
}

// --- HELPERS ---

export const maxRadiusFor = (viewport: Viewport, fraction: number): number =>
    (Math.min(viewport.width, viewport.height) / 2) * fraction;

/** Background colour by temperature, hottest first. */
export const backgroundFor = (temperatureKelvin: number): string => {
    if (temperatureKelvin === Infinity) return 'white';
    if (temperatureKelvin > 1e12) return 'yellow';
    if (temperatureKelvin > 1e9) return 'orange';
    if (temperatureKelvin > 3000) return 'darkred';
    if (temperatureKelvin > 50) return '#400040';
    if (temperatureKelvin > 2.7) return '#100015';
    return 'black';
};

class SceneBuilder {
    readonly objects: SceneObject[] = [];

    constructor(readonly rng: Random) {}

    add(kind: ObjectKind, x: number, y: number, radius: number, color: string, outline?: string) {
        const object: SceneObject = { id: this.objects.length, kind, x, y, radius, color };
        if (outline) object.outline = outline;
        this.objects.push(object);
    }

    /** Uniform angle, uniform radius in [rMin, rMax]; clusters toward the centre. */
    scatter(count: number, rMin: number, rMax: number, draw: (x: number, y: number) => void) {
        for (let i = 0; i < count; i++) {
            const r = this.rng.uniform(rMin, rMax);
            const a = this.rng.uniform(0, 2 * Math.PI);
            draw(r * Math.cos(a), r * Math.sin(a));
        }
    }
}

// --- EPOCH STEPPER ---

/**
 * Hand-tuned scene for one catalog epoch. Coordinates are pixels around the
 * viewport centre.
 */
export const buildEpochScene = (epoch: CatalogEpoch, viewport: Viewport, seed: number): Scene => {
    const b = new SceneBuilder(createRandom(seed));
    const maxRadius = maxRadiusFor(viewport, STEPPER_RADIUS_FRACTION);

    switch (epoch.visual) {
        case 'singularity':
            b.add('particle', 0, 0, 1, 'white');
            return { background: 'black', objects: b.objects };

        case 'inflation': {
            const radius = maxRadius * 0.1;
            b.scatter(50, 0, radius, (x, y) => b.add('particle', x, y, 1, 'yellow'));
            return { background: 'white', boundary: { radius, color: 'red' }, objects: b.objects };
        }

        case 'plasmaSoup': {
            const radius = maxRadius * 0.3;
            b.scatter(150, 0, radius * 0.95, (x, y) =>
                b.add('particle', x, y, 2, b.rng.pick(['red', 'blue', 'white'])));
            return {
                background: 'orange',
                boundary: { radius, color: 'yellow', dashed: true },
                objects: b.objects,
            };
        }

        case 'transparentAtoms': {
            const radius = maxRadius * 0.5;
            b.scatter(80, 0, radius * 0.95, (x, y) => b.add('atom', x, y, 1, 'lightgray'));
            return { background: 'darkred', boundary: { radius, color: 'gray' }, objects: b.objects };
        }

        case 'firstStructures': {
            const radius = maxRadius * 0.7;
            const clumps = Array.from({ length: 5 }, () => ({
                x: (b.rng.uniform(0.1, 0.9) - 0.5) * viewport.width,
                y: (b.rng.uniform(0.1, 0.9) - 0.5) * viewport.height,
            }));
            const spread = maxRadius * 0.15;
            for (let i = 0; i < 100; i++) {
                const c = b.rng.pick(clumps);
                const x = b.rng.gauss(c.x, spread);
                const y = b.rng.gauss(c.y, spread);
                if (Math.hypot(x, y) < radius * 0.95) b.add('star', x, y, 1, 'lightblue');
            }
            return { background: '#200020', boundary: { radius, color: 'gray' }, objects: b.objects };
        }

        case 'formingGalaxies': {
            const radius = maxRadius * 0.85;
            b.scatter(15, radius * 0.1, radius * 0.9, (x, y) =>
                b.add('galaxy', x, y, b.rng.uniform(3, 8), b.rng.pick(['yellow', 'white', 'lightblue'])));
            return { background: '#100015', boundary: { radius, color: 'darkgray' }, objects: b.objects };
        }

        case 'modernGalaxies':
            b.scatter(10, maxRadius * 0.3, maxRadius * 0.95, (x, y) =>
                b.add('galaxy', x, y, b.rng.uniform(4, 10), b.rng.pick(['white', 'lightyellow', 'orange']), 'gray'));
            return { background: 'black', objects: b.objects };

        case 'distantGalaxies':
            b.scatter(5, maxRadius * 0.5, maxRadius * 0.98, (x, y) =>
                b.add('galaxy', x, y, b.rng.uniform(3, 8), b.rng.pick(['orange', 'red']), 'darkgray'));
            return { background: 'black', objects: b.objects };

        case 'emptyCold':
            for (let i = 0; i < 3; i++) {
                const x = (b.rng.next() - 0.5) * viewport.width;
                const y = (b.rng.next() - 0.5) * viewport.height;
                b.add('remnant', x, y, 1, '#333333');
            }
            return { background: 'black', objects: b.objects };
    }
};

// --- EXPLORER ---

/**
 * Positions fixed in expanding coordinates. Later first visits see more
 * galaxies; before 500 Myr everything is a star.
 */
export const createComovingField = (
    timeYears: number,
    maxRadius: number,
    seed: number,
    count = COMOVING_OBJECT_COUNT,
): ComovingField => {
    const rng = createRandom(seed);
    const galaxyChance = Math.sqrt(Math.max(0, timeYears) / PRESENT_AGE_YEARS);
    const objects: ComovingObject[] = [];

    for (let i = 0; i < count; i++) {
        const gaussian = rng.gauss(maxRadius * 0.6, maxRadius * 0.4);
        const radius = Math.max(0, Math.min(maxRadius * 1.5, gaussian));
        const angle = rng.uniform(0, 2 * Math.PI);
        let kind: ComovingObject['kind'] = rng.next() < galaxyChance ? 'galaxy' : 'star';
        if (timeYears < EARLY_GALAXY_CUTOFF_YEARS && kind === 'galaxy') kind = 'star';
        objects.push({ radius, angle, kind });
    }
    return { maxRadius, objects };
};

/** Keeps an existing field while it still fits the viewport. */
export const ensureComovingField = (
    field: ComovingField | null,
    timeYears: number,
    viewport: Viewport,
    seed: number,
): ComovingField => {
    const maxRadius = maxRadiusFor(viewport, EXPLORER_RADIUS_FRACTION);
    if (field && field.maxRadius === maxRadius && field.objects.length === COMOVING_OBJECT_COUNT) {
        return field;
    }
    return createComovingField(timeYears, maxRadius, seed);
};

/** Scene for an arbitrary engine descriptor. */
export const buildExplorerScene = (
    descriptor: EpochDescriptor,
    viewport: Viewport,
    field: ComovingField | null,
    seed: number,
): Scene => {
    const b = new SceneBuilder(createRandom(seed));
    const maxRadius = maxRadiusFor(viewport, EXPLORER_RADIUS_FRACTION);
    const a = descriptor.scaleFactor;
    const background = backgroundFor(descriptor.temperatureKelvin);

    switch (renderClassOf(descriptor.phase)) {
        case 'singularity':
            break;

        case 'plasma': {
            const count = Math.floor(Math.max(50, Math.min(500, 200 / a)));
            const reach = maxRadius * Math.sqrt(a);
            b.scatter(count, 0, reach, (x, y) =>
                b.add('particle', x, y, 2, b.rng.pick(['red', 'white', 'yellow', 'orange'])));
            break;
        }

        case 'atoms': {
            const count = Math.floor(Math.max(30, Math.min(400, 150 / a)));
            b.scatter(count, 0, maxRadius, (x, y) => b.add('atom', x, y, 1.5, 'lightgrey'));
            break;
        }

        case 'structures': {
            const current = field ?? createComovingField(descriptor.timeYears, maxRadius, seed);
            for (const o of current.objects) {
                const r = a * o.radius;
                if (!(r < maxRadius * 2.0)) continue;
                if (o.kind === 'galaxy') b.add('galaxy', r * Math.cos(o.angle), r * Math.sin(o.angle), 5, 'white');
                else b.add('star', r * Math.cos(o.angle), r * Math.sin(o.angle), 2, 'lightblue');
            }
            break;
        }
    }

    return { background, objects: b.objects };
};

// --- IDENTIFY ---

export const identifyObject = (kind: ObjectKind | null): string => {
    switch (kind) {
        case 'galaxy':
            return 'Galaxy (Conceptual)';
        case 'star':
            return 'Star (Conceptual)';
        case 'particle':
        case 'atom':
            return 'Particle/Atom (Conceptual)';
        default:
            return 'Unknown Object';
    }
};
