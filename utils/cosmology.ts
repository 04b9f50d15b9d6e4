import { Phase } from '../types';
import type { CosmologyParameters, EpochDescriptor, Regime, RenderClass } from '../types';
import {
    DEFAULT_COSMOLOGY,
    FIRST_STARS_YEARS,
    KM_PER_MPC,
    NUCLEOSYNTHESIS_END_SECONDS,
    NUCLEOSYNTHESIS_START_SECONDS,
    PLANCK_SECONDS,
    QUARK_HADRON_KELVIN,
    RECOMBINATION_ONSET_KELVIN,
    RECOMBINATION_YEARS,
    SECONDS_PER_YEAR_HUBBLE,
} from '../constants';
import { SECONDS_PER_YEAR, yearsFromSeconds } from './time';

// --- REGIMES ---

/** H0 expressed per year. */
export const hubblePerYear = (cosmology: CosmologyParameters): number =>
    (cosmology.hubbleConstant / KM_PER_MPC) * SECONDS_PER_YEAR_HUBBLE;

/** Scale factor at matter–dark-energy equality, relative to today. */
export const matterLambdaScaleFactor = (cosmology: CosmologyParameters): number =>
    Math.cbrt(cosmology.omegaMatter / cosmology.omegaLambda);

export const regimeAt = (timeYears: number, cosmology: CosmologyParameters = DEFAULT_COSMOLOGY): Regime => {
    if (!(timeYears > 0)) return 'singularity';
    if (timeYears < cosmology.radiationMatterEqualityYears) return 'radiation';
    if (timeYears < cosmology.matterLambdaEqualityYears) return 'matter';
    return 'darkEnergy';
};

/**
 * Piecewise closed-form scale factor. Each regime is anchored to its
 * neighbour's value at the boundary; the dark-energy branch is renormalized
 * so the present age gives exactly 1. The matter/dark-energy hand-off is
 * only approximately continuous.
 */
export const scaleFactorAt = (timeYears: number, cosmology: CosmologyParameters = DEFAULT_COSMOLOGY): number => {
    const regime = regimeAt(timeYears, cosmology);
    const tRm = cosmology.radiationMatterEqualityYears;
    const tMl = cosmology.matterLambdaEqualityYears;
    const aMl = matterLambdaScaleFactor(cosmology);

    let a: number;
    switch (regime) {
        case 'singularity':
            a = cosmology.scaleFactorFloor;
            break;
        case 'radiation': {
            const aRm = aMl * Math.pow(tRm / tMl, 2 / 3);
            a = aRm * Math.pow(timeYears / tRm, 0.5);
            break;
        }
        case 'matter':
            a = aMl * Math.pow(timeYears / tMl, 2 / 3);
            break;
        case 'darkEnergy': {
            const rate = hubblePerYear(cosmology) * Math.sqrt(cosmology.omegaLambda);
            const raw = aMl * Math.exp(rate * (timeYears - tMl));
            const atPresent = aMl * Math.exp(rate * (cosmology.presentAgeYears - tMl));
            a = raw / atPresent;
            break;
        }
    }

    if (!Number.isFinite(a)) return a > 0 ? Number.MAX_VALUE : cosmology.scaleFactorFloor;
    return Math.max(cosmology.scaleFactorFloor, a);
};

// --- PHASES ---

/**
 * Ordered ladder; the first matching rung wins. Windows overlap (the
 * nucleosynthesis window is also above the opaque-plasma temperature), so
 * the order is part of the contract.
 */
export const classifyPhase = (
    timeYears: number,
    temperatureKelvin: number,
    cosmology: CosmologyParameters = DEFAULT_COSMOLOGY,
): Phase => {
    if (!(timeYears * SECONDS_PER_YEAR >= PLANCK_SECONDS)) return Phase.Planck;
    if (temperatureKelvin > QUARK_HADRON_KELVIN) return Phase.QuarkGluonPlasma;
    if (
        timeYears > yearsFromSeconds(NUCLEOSYNTHESIS_START_SECONDS) &&
        timeYears < yearsFromSeconds(NUCLEOSYNTHESIS_END_SECONDS)
    ) {
        return Phase.Nucleosynthesis;
    }
    if (temperatureKelvin > RECOMBINATION_ONSET_KELVIN) return Phase.OpaquePlasma;
    if (timeYears < FIRST_STARS_YEARS) {
        return timeYears > RECOMBINATION_YEARS ? Phase.DarkAges : Phase.Recombination;
    }
    if (timeYears < cosmology.matterLambdaEqualityYears) return Phase.StructureFormation;
    return Phase.DarkEnergy;
};

export const renderClassOf = (phase: Phase): RenderClass => {
    switch (phase) {
        case Phase.Planck:
            return 'singularity';
        case Phase.QuarkGluonPlasma:
        case Phase.Nucleosynthesis:
        case Phase.OpaquePlasma:
            return 'plasma';
        case Phase.Recombination:
        case Phase.DarkAges:
            return 'atoms';
        case Phase.StructureFormation:
        case Phase.DarkEnergy:
            return 'structures';
    }
};

// --- ENGINE ---

/**
 * Physical state of the model universe at `timeYears`.
 *
 * Total over the reals: zero, negative and NaN times all land on the
 * singularity (floor scale factor, infinite temperature). Those are
 * clamps, not validation.
 */
export const stateAt = (timeYears: number, cosmology: CosmologyParameters = DEFAULT_COSMOLOGY): EpochDescriptor => {
    const regime = regimeAt(timeYears, cosmology);
    const scaleFactor = scaleFactorAt(timeYears, cosmology);
    const temperatureKelvin = regime === 'singularity'
        ? Infinity
        : cosmology.cmbTemperatureToday / scaleFactor;
    const phase = regime === 'singularity'
        ? Phase.Planck
        : classifyPhase(timeYears, temperatureKelvin, cosmology);
    const densityHint = cosmology.omegaMatter / Math.pow(scaleFactor, 3);

    return Object.freeze({
        timeYears,
        regime,
        scaleFactor,
        temperatureKelvin,
        phase,
        densityHint,
        visual: Object.freeze({ density: densityHint, colorTemperature: temperatureKelvin }),
    });
};
