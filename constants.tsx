import type { CatalogEpoch, CosmologyParameters } from './types';

// --- COSMOLOGY (illustrative) ---

export const DEFAULT_COSMOLOGY: CosmologyParameters = {
  hubbleConstant: 70,
  omegaMatter: 0.3,
  omegaRadiation: 9e-5,
  omegaLambda: 1.0 - 0.3 - 9e-5,
  cmbTemperatureToday: 2.725,
  presentAgeYears: 13.8e9,
  radiationMatterEqualityYears: 50_000,
  matterLambdaEqualityYears: 9.8e9,
  scaleFactorFloor: 1e-30,
};

export const KM_PER_MPC = 3.086e19;
export const SECONDS_PER_YEAR_HUBBLE = 3.154e7;

// --- PHASE LADDER THRESHOLDS ---

export const PLANCK_SECONDS = 1e-12;
export const QUARK_HADRON_KELVIN = 1e12;
export const NUCLEOSYNTHESIS_START_SECONDS = 10;
export const NUCLEOSYNTHESIS_END_SECONDS = 20 * 60;
// Photon-baryon fluid stays opaque above this; recombination runs from here
// down to the recombination epoch.
export const RECOMBINATION_ONSET_KELVIN = 4000;
export const RECOMBINATION_YEARS = 377_000;
export const FIRST_STARS_YEARS = 200e6;

// --- EXPLORER ---

export const LOG_SECONDS_MIN = -43;
export const LOG_SECONDS_MAX = 20;
export const LOG_SECONDS_STEP = 0.1;
export const ZOOM_MIN = 0.01;
export const ZOOM_MAX = 100;
export const ZOOM_IN_FACTOR = 1.1;
export const ZOOM_OUT_FACTOR = 0.9;
export const COMOVING_OBJECT_COUNT = 70;

export const SPRITES = {
  galaxy: { path: '/galaxy.png', size: 50 },
  star: { path: '/star.png', size: 15 },
} as const;

// --- EPOCH CATALOG ---

export const FUTURE_NOTE = [
  '--- Prediction Note ---',
  "This 'future' state is a simplified extrapolation based on current cosmological models (Lambda-CDM).",
  'The actual long-term future is subject to ongoing research and potential unknown physics.',
].join('\n');

export const HEAT_DEATH_NOTE =
  'This scenario assumes continued dark energy dominance and proton stability (or very long decay time).';

export const EPOCHS: CatalogEpoch[] = [
  {
    id: 'singularity',
    name: 'Big Bang Singularity',
    timeYears: 0,
    temperatureLabel: 'Infinite',
    sizeFactor: 0,
    description: 'The universe begins as an infinitely hot and dense point.',
    visual: 'singularity',
    isFuture: false,
  },
  {
    id: 'inflation',
    name: 'Inflation',
    timeYears: 1e-34 / (365 * 24 * 3600),
    temperatureLabel: '~10^27 K',
    sizeFactor: 1e-26,
    description: 'Rapid exponential expansion. Universe filled with quark-gluon plasma.',
    visual: 'inflation',
    isFuture: false,
  },
  {
    id: 'nucleosynthesis',
    name: 'Nucleosynthesis',
    timeYears: 3 / (60 * 24 * 365),
    temperatureLabel: '~10^9 K',
    sizeFactor: 1e-15,
    description:
      'Protons and neutrons fuse to form the first light nuclei (Hydrogen, Helium, Lithium). Universe is opaque plasma.',
    visual: 'plasmaSoup',
    isFuture: false,
  },
  {
    id: 'recombination',
    name: 'Recombination',
    timeYears: 377_000,
    temperatureLabel: '~3000 K',
    sizeFactor: 1 / 1100,
    description:
      'Universe cools enough for electrons to combine with nuclei, forming neutral atoms. Light can travel freely (CMB is released). Universe becomes transparent.',
    visual: 'transparentAtoms',
    isFuture: false,
  },
  {
    id: 'first-stars',
    name: 'Dark Ages & First Stars',
    timeYears: 400_000_000,
    temperatureLabel: '~60 K',
    sizeFactor: 1 / 20,
    description:
      'Gravity slowly pulls matter together. The first stars and galaxies begin to form, reionizing the universe.',
    visual: 'firstStructures',
    isFuture: false,
  },
  {
    id: 'galaxy-peak',
    name: 'Galaxy Formation Peak',
    timeYears: 3_000_000_000,
    temperatureLabel: '~10 K',
    sizeFactor: 1 / 3,
    description: 'Peak era of star formation and galaxy assembly. Quasars are common.',
    visual: 'formingGalaxies',
    isFuture: false,
  },
  {
    id: 'present',
    name: 'Present Day',
    timeYears: 13_800_000_000,
    temperatureLabel: '2.7 K (CMB)',
    sizeFactor: 1,
    description:
      'Universe dominated by dark energy, leading to accelerated expansion. Complex structures (clusters, superclusters) exist.',
    visual: 'modernGalaxies',
    isFuture: false,
  },
  {
    id: 'continued-expansion',
    name: 'Future - Continued Expansion',
    timeYears: 100_000_000_000,
    temperatureLabel: '< 1 K',
    sizeFactor: 10,
    description: 'Accelerated expansion continues. Galaxies move further apart. Star formation declines.',
    visual: 'distantGalaxies',
    isFuture: true,
  },
  {
    id: 'heat-death',
    name: 'Future - Heat Death?',
    timeYears: 1e14,
    temperatureLabel: '-> 0 K',
    sizeFactor: '>> 10',
    description:
      'If expansion continues indefinitely: Star formation ceases, stars die, black holes evaporate (very long term). Universe approaches maximum entropy.',
    visual: 'emptyCold',
    isFuture: true,
  },
];
