import type { CosmologyParameters, SimulationState } from '../types';
import { DEFAULT_COSMOLOGY } from '../constants';
import { logSecondsFromYears } from './time';
import { IDENTITY_VIEW } from './view';

type Check = (value: number) => boolean;

const positive: Check = (v) => v > 0;
const fraction: Check = (v) => v > 0 && v < 1;
const nonNegativeFraction: Check = (v) => v >= 0 && v < 1;

const CHECKS: Record<keyof CosmologyParameters, Check> = {
    hubbleConstant: positive,
    omegaMatter: fraction,
    omegaRadiation: nonNegativeFraction,
    omegaLambda: fraction,
    cmbTemperatureToday: positive,
    presentAgeYears: positive,
    radiationMatterEqualityYears: positive,
    matterLambdaEqualityYears: positive,
    scaleFactorFloor: positive,
};

const KEYS: (keyof CosmologyParameters)[] = [
    'hubbleConstant',
    'omegaMatter',
    'omegaRadiation',
    'omegaLambda',
    'cmbTemperatureToday',
    'presentAgeYears',
    'radiationMatterEqualityYears',
    'matterLambdaEqualityYears',
    'scaleFactorFloor',
];

// Short names accepted in the page query string.
const QUERY_ALIASES: Record<string, keyof CosmologyParameters> = {
    H0: 'hubbleConstant',
    omegaM: 'omegaMatter',
    omegaR: 'omegaRadiation',
    omegaL: 'omegaLambda',
    T0: 'cmbTemperatureToday',
};

/**
 * Merges overrides onto the default cosmology. Values that are not finite or
 * fall outside their range are dropped with a warning. Ω_L0 is derived from
 * the other densities unless given explicitly, and the regime boundaries must
 * stay ordered or both fall back to their defaults.
 */
export const resolveCosmology = (overrides: Partial<CosmologyParameters> = {}): CosmologyParameters => {
    const accepted: Partial<CosmologyParameters> = {};

    for (const key of KEYS) {
        const value = overrides[key];
        if (value === undefined) continue;
        if (!Number.isFinite(value) || !CHECKS[key](value)) {
            console.warn(`[cosmology] ignoring ${key}=${value}; using ${DEFAULT_COSMOLOGY[key]}`);
            continue;
        }
        accepted[key] = value;
    }

    const resolved: CosmologyParameters = { ...DEFAULT_COSMOLOGY, ...accepted };

    if (accepted.omegaLambda === undefined) {
        const derived = 1.0 - resolved.omegaMatter - resolved.omegaRadiation;
        if (derived > 0) {
            resolved.omegaLambda = derived;
        } else {
            console.warn(`[cosmology] Ω_L0 would be ${derived}; keeping ${DEFAULT_COSMOLOGY.omegaLambda}`);
            resolved.omegaLambda = DEFAULT_COSMOLOGY.omegaLambda;
        }
    }

    if (resolved.radiationMatterEqualityYears >= resolved.matterLambdaEqualityYears) {
        console.warn('[cosmology] equality times out of order; using defaults');
        resolved.radiationMatterEqualityYears = DEFAULT_COSMOLOGY.radiationMatterEqualityYears;
        resolved.matterLambdaEqualityYears = DEFAULT_COSMOLOGY.matterLambdaEqualityYears;
    }

    return resolved;
};

/** Reads overrides such as `?H0=67.4&omegaM=0.315` from a query string. */
export const cosmologyFromQuery = (search: string): CosmologyParameters => {
    const params = new URLSearchParams(search);
    const overrides: Partial<CosmologyParameters> = {};

    params.forEach((raw, name) => {
        const key = QUERY_ALIASES[name] ?? KEYS.find((k) => k === name);
        if (!key) return;
        overrides[key] = Number(raw);
    });

    return resolveCosmology(overrides);
};

/** Boots in the stepper, with the explorer slider parked at the present age. */
export const initialSimulationState = (cosmology: CosmologyParameters = DEFAULT_COSMOLOGY): SimulationState => ({
    mode: 'stepper',
    epochIndex: 0,
    logTimeSeconds: logSecondsFromYears(cosmology.presentAgeYears),
    view: IDENTITY_VIEW,
    seed: 1,
    identified: null,
});
