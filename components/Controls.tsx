import React from 'react';
import {
  ChevronLeft,
  ChevronRight,
  Clock,
  Crosshair,
  Info,
  Layers,
  Thermometer,
  RotateCcw,
} from 'lucide-react';
import type { EpochDescriptor, SimulationState, ViewMode } from '../types';
import { EPOCHS, LOG_SECONDS_MAX, LOG_SECONDS_MIN, LOG_SECONDS_STEP } from '../constants';
import { formatCatalogTime, formatExplorerTime, formatScientific, formatTemperature } from '../utils/time';
import { describeCatalogEpoch, describeState } from '../utils/describe';
import { IDENTITY_VIEW } from '../utils/view';

interface ControlsProps {
  state: SimulationState;
  descriptor: EpochDescriptor;
  updateState: (partial: Partial<SimulationState>) => void;
}

const GlassPanel: React.FC<{ children: React.ReactNode; className?: string }> = ({ children, className }) => (
  <div className={`backdrop-blur-xl bg-white/5 border border-white/10 rounded-2xl shadow-2xl text-white ${className ?? ''}`}>
    {children}
  </div>
);

const ModeButton: React.FC<{ label: string; active: boolean; onClick: () => void }> = ({ label, active, onClick }) => (
  <button
    onClick={onClick}
    aria-pressed={active}
    className={`flex-1 text-xs py-1.5 rounded-md transition-all ${active ? 'bg-indigo-600 text-white' : 'text-gray-400 hover:text-white'}`}
  >
    {label}
  </button>
);

const TimeSlider: React.FC<{ value: number; onChange: (val: number) => void }> = ({ value, onChange }) => (
  <div className="mb-2">
    <div className="flex justify-between text-xs text-gray-400 mb-1">
      <label htmlFor="log-time">Log10(Time in Seconds)</label>
      <span>{value.toFixed(1)}</span>
    </div>
    <input
      id="log-time"
      type="range"
      min={LOG_SECONDS_MIN}
      max={LOG_SECONDS_MAX}
      step={LOG_SECONDS_STEP}
      value={value}
      onChange={(e) => {
        const v = parseFloat(e.target.value);
        if (Number.isFinite(v)) onChange(v);
      }}
      className="w-full h-1 bg-gray-700 rounded-lg appearance-none cursor-pointer accent-indigo-500 hover:accent-indigo-400"
    />
  </div>
);

const Details: React.FC<{ text: string }> = ({ text }) => (
  <GlassPanel className="p-4">
    <div className="flex items-center gap-2 mb-2 text-indigo-300 border-b border-white/10 pb-2">
      <Info size={16} />
      <h2 className="font-semibold text-sm">Details</h2>
    </div>
    <pre data-testid="details" className="whitespace-pre-wrap font-sans text-sm text-gray-300 leading-relaxed">
      {text}
    </pre>
  </GlassPanel>
);

export const Controls: React.FC<ControlsProps> = ({ state, descriptor, updateState }) => {
  const epochIndex = Math.min(Math.max(state.epochIndex, 0), EPOCHS.length - 1);
  const epoch = EPOCHS[epochIndex];
  const isStepper = state.mode === 'stepper';

  const setMode = (mode: ViewMode) => updateState({ mode, identified: null, view: IDENTITY_VIEW });

  return (
    <>
      {/* Top Status Bar */}
      <div className="absolute top-4 left-1/2 -translate-x-1/2 z-10 w-[90%] max-w-3xl">
        <GlassPanel className="px-6 py-3 flex items-center justify-between gap-4">
          <div className="flex items-center gap-3">
            <Layers size={16} className="text-indigo-300" />
            <span data-testid="epoch-name" className="font-semibold tracking-wide text-sm md:text-base">
              {isStepper ? epoch.name : descriptor.phase}
            </span>
          </div>
          <div className="flex items-center gap-2 text-xs text-gray-400">
            <Clock size={14} />
            <span data-testid="epoch-time">
              ~ {isStepper ? formatCatalogTime(epoch.timeYears) : formatExplorerTime(descriptor.timeYears)}
            </span>
          </div>
          {!isStepper && (
            <div className="flex items-center gap-2 text-xs font-mono text-indigo-300">
              <Thermometer size={14} />
              <span>{formatTemperature(descriptor.temperatureKelvin)}</span>
              <span className="text-gray-500">a = {formatScientific(descriptor.scaleFactor, 3, true)}</span>
            </div>
          )}
        </GlassPanel>
      </div>

      {/* Bottom Panel */}
      <div className="absolute bottom-4 left-1/2 -translate-x-1/2 z-10 w-[95%] max-w-3xl flex flex-col gap-3">
        <GlassPanel className="p-4">
          <div className="flex bg-black/40 rounded-lg p-1 mb-3">
            <ModeButton label="Epoch Stepper" active={isStepper} onClick={() => setMode('stepper')} />
            <ModeButton label="Interactive Explorer" active={!isStepper} onClick={() => setMode('explorer')} />
          </div>

          {isStepper ? (
            <div className="flex items-center justify-between">
              <button
                onClick={() => updateState({ epochIndex: epochIndex - 1 })}
                disabled={epochIndex === 0}
                className="flex items-center gap-1 px-4 py-2 rounded-xl bg-white/10 hover:bg-white/20 disabled:opacity-30 disabled:cursor-not-allowed"
              >
                <ChevronLeft size={16} />
                Previous Epoch
              </button>
              <span className="text-xs text-gray-400">
                {epochIndex + 1} / {EPOCHS.length}
              </span>
              <button
                onClick={() => updateState({ epochIndex: epochIndex + 1 })}
                disabled={epochIndex === EPOCHS.length - 1}
                className="flex items-center gap-1 px-4 py-2 rounded-xl bg-white/10 hover:bg-white/20 disabled:opacity-30 disabled:cursor-not-allowed"
              >
                Next Epoch
                <ChevronRight size={16} />
              </button>
            </div>
          ) : (
            <>
              <TimeSlider value={state.logTimeSeconds} onChange={(v) => updateState({ logTimeSeconds: v, identified: null })} />
              <div className="flex items-center justify-between text-xs text-gray-400">
                <span className="flex items-center gap-1">
                  <Crosshair size={12} />
                  {state.identified ?? 'Nothing identified'}
                </span>
                <button
                  onClick={() => updateState({ view: IDENTITY_VIEW })}
                  className="flex items-center gap-1 hover:text-white"
                >
                  <RotateCcw size={12} />
                  Reset View
                </button>
              </div>
            </>
          )}
        </GlassPanel>

        <Details text={isStepper ? describeCatalogEpoch(epoch) : describeState(descriptor, state.identified)} />
      </div>
    </>
  );
};
