
import React, { useMemo, useState } from 'react';
import { CosmosCanvas } from './components/CosmosCanvas';
import { Controls } from './components/Controls';
import type { ObjectKind, SimulationState, ViewTransform } from './types';
import { stateAt } from './utils/cosmology';
import { cosmologyFromQuery, initialSimulationState } from './utils/config';
import { identifyObject } from './utils/scene';
import { yearsFromLogSeconds } from './utils/time';

const App: React.FC = () => {
  const cosmology = useMemo(() => cosmologyFromQuery(window.location.search), []);

  const [state, setState] = useState<SimulationState>(() => initialSimulationState(cosmology));

  const descriptor = useMemo(
    () => stateAt(yearsFromLogSeconds(state.logTimeSeconds), cosmology),
    [state.logTimeSeconds, cosmology],
  );

  const updateState = (partial: Partial<SimulationState>) => {
    setState((prev) => ({ ...prev, ...partial }));
  };

  const updateView = (update: (view: ViewTransform) => ViewTransform) => {
    setState((prev) => ({ ...prev, view: update(prev.view) }));
  };

  const onIdentify = (kind: ObjectKind) => {
    const label = identifyObject(kind);
    console.info(`[identify] ${label}`);
    setState((prev) => ({ ...prev, identified: label }));
  };

  return (
    <div className="relative w-full h-screen bg-black overflow-hidden select-none">
      <CosmosCanvas state={state} descriptor={descriptor} updateView={updateView} onIdentify={onIdentify} />
      <Controls state={state} descriptor={descriptor} updateState={updateState} />
    </div>
  );
};

export default App;
