import React from 'react';
import { describe, it, expect, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import { Controls } from './Controls';
import { stateAt } from '../utils/cosmology';
import { initialSimulationState } from '../utils/config';
import { yearsFromLogSeconds } from '../utils/time';
import { IDENTITY_VIEW } from '../utils/view';
import { Phase, type SimulationState } from '../types';

const baseState: SimulationState = initialSimulationState();

const renderControls = (overrides: Partial<SimulationState> = {}) => {
  const state = { ...baseState, ...overrides };
  const updateState = vi.fn();
  render(
    <Controls
      state={state}
      descriptor={stateAt(yearsFromLogSeconds(state.logTimeSeconds))}
      updateState={updateState}
    />,
  );
  return updateState;
};

describe('Controls', () => {
  describe('epoch stepper', () => {
    it('should show the first epoch with Previous disabled', () => {
      const updateState = renderControls();
      expect(screen.getByTestId('epoch-name').textContent).toBe('Big Bang Singularity');
      expect(screen.getByTestId('epoch-time').textContent).toBe('~ 0 (Singularity)');
      expect(screen.getByRole('button', { name: 'Previous Epoch' }).hasAttribute('disabled')).toBe(true);

      fireEvent.click(screen.getByRole('button', { name: 'Next Epoch' }));
      expect(updateState).toHaveBeenCalledWith({ epochIndex: 1 });
    });

    it('should disable Next at the last epoch', () => {
      const updateState = renderControls({ epochIndex: 8 });
      expect(screen.getByTestId('epoch-name').textContent).toBe('Future - Heat Death?');
      expect(screen.getByRole('button', { name: 'Next Epoch' }).hasAttribute('disabled')).toBe(true);

      fireEvent.click(screen.getByRole('button', { name: 'Previous Epoch' }));
      expect(updateState).toHaveBeenCalledWith({ epochIndex: 7 });
    });

    it('should show the catalog text in the details panel', () => {
      renderControls({ epochIndex: 3 });
      expect(screen.getByTestId('details').textContent?.startsWith('Approx. Temp: ~3000 K\nKey Events:')).toBe(true);
    });
  });

  describe('mode switch', () => {
    it('should switch to the explorer and clear the identification', () => {
      const updateState = renderControls();
      fireEvent.click(screen.getByRole('button', { name: 'Interactive Explorer' }));
      expect(updateState).toHaveBeenCalledWith({ mode: 'explorer', identified: null, view: IDENTITY_VIEW });
    });

    it('should drop the explorer pan and zoom when going back to the stepper', () => {
      const updateState = renderControls({ mode: 'explorer', view: { zoom: 2, centerX: 40, centerY: 8 } });
      fireEvent.click(screen.getByRole('button', { name: 'Epoch Stepper' }));
      expect(updateState).toHaveBeenCalledWith({ mode: 'stepper', identified: null, view: IDENTITY_VIEW });
    });
  });

  describe('interactive explorer', () => {
    it('should name the phase at the present day', () => {
      renderControls({ mode: 'explorer' });
      expect(screen.getByTestId('epoch-name').textContent).toBe(Phase.DarkEnergy);
      expect(screen.getByTestId('epoch-time').textContent).toBe('~ 13.80 billion years');
      expect(screen.queryByRole('button', { name: 'Next Epoch' })).toBeNull();
    });

    it('should report slider moves in log seconds and forget the identified object', () => {
      const updateState = renderControls({ mode: 'explorer', identified: 'Galaxy (Conceptual)' });
      fireEvent.change(screen.getByLabelText('Log10(Time in Seconds)'), { target: { value: '0' } });
      expect(updateState).toHaveBeenCalledWith({ logTimeSeconds: 0, identified: null });
    });

    it('should put the identified object first in the details', () => {
      renderControls({ mode: 'explorer', identified: 'Star (Conceptual)' });
      const details = screen.getByTestId('details').textContent ?? '';
      expect(details.startsWith('Identified: Star (Conceptual)\n---\n')).toBe(true);
    });

    it('should reset the view', () => {
      const updateState = renderControls({ mode: 'explorer', view: { zoom: 3, centerX: 10, centerY: 5 } });
      fireEvent.click(screen.getByRole('button', { name: 'Reset View' }));
      expect(updateState).toHaveBeenCalledWith({ view: IDENTITY_VIEW });
    });
  });
});
