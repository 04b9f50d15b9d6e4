
export enum Phase {
  Planck = 'Inflation/Planck Era',
  QuarkGluonPlasma = 'Quark-Gluon Plasma',
  Nucleosynthesis = 'Big Bang Nucleosynthesis',
  OpaquePlasma = 'Opaque Plasma (Photon-Baryon Fluid)',
  Recombination = 'Recombination Ongoing',
  DarkAges = 'Dark Ages (Neutral Atoms, CMB Released)',
  StructureFormation = 'Structure Formation (Stars, Galaxies)',
  DarkEnergy = 'Dark Energy Dominated Expansion',
}

export type Regime = 'singularity' | 'radiation' | 'matter' | 'darkEnergy';

export type RenderClass = 'singularity' | 'plasma' | 'atoms' | 'structures';

export interface CosmologyParameters {
  hubbleConstant: number; // km/s/Mpc
  omegaMatter: number;
  omegaRadiation: number;
  omegaLambda: number;
  cmbTemperatureToday: number; // K
  presentAgeYears: number;
  radiationMatterEqualityYears: number;
  matterLambdaEqualityYears: number;
  scaleFactorFloor: number;
}

export interface EpochDescriptor {
  readonly timeYears: number;
  readonly regime: Regime;
  readonly scaleFactor: number;
  readonly temperatureKelvin: number; // Infinity at the singularity
  readonly phase: Phase;
  readonly densityHint: number;
  readonly visual: {
    readonly density: number;
    readonly colorTemperature: number;
  };
}

export type EpochVisual =
  | 'singularity'
  | 'inflation'
  | 'plasmaSoup'
  | 'transparentAtoms'
  | 'firstStructures'
  | 'formingGalaxies'
  | 'modernGalaxies'
  | 'distantGalaxies'
  | 'emptyCold';

export interface CatalogEpoch {
  id: string;
  name: string;
  timeYears: number;
  temperatureLabel: string;
  sizeFactor: number | string; // illustrative only
  description: string;
  visual: EpochVisual;
  isFuture: boolean;
}

export type ObjectKind = 'particle' | 'atom' | 'star' | 'galaxy' | 'remnant';

export interface SceneObject {
  id: number;
  kind: ObjectKind;
  x: number;
  y: number;
  radius: number;
  color: string;
  outline?: string;
}

export interface SceneBoundary {
  radius: number;
  color: string;
  dashed?: boolean;
}

export interface Scene {
  background: string;
  boundary?: SceneBoundary;
  objects: SceneObject[];
}

export interface Viewport {
  width: number;
  height: number;
}

export type ViewMode = 'stepper' | 'explorer';

export interface ViewTransform {
  zoom: number;
  centerX: number; // camera centre, world pixels
  centerY: number;
}

export interface SimulationState {
  mode: ViewMode;
  epochIndex: number;
  logTimeSeconds: number; // slider position, log10(seconds)
  view: ViewTransform;
  seed: number;
  identified: string | null;
}
