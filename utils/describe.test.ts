import { describe, it, expect } from 'vitest';
import { EXPLORER_HINT, describeCatalogEpoch, describeState } from './describe';
import { stateAt } from './cosmology';
import { EPOCHS, FUTURE_NOTE, HEAT_DEATH_NOTE } from '../constants';
import { Phase } from '../types';

describe('Describe', () => {
    describe('describeCatalogEpoch', () => {
        it('should list temperature and key events', () => {
            expect(describeCatalogEpoch(EPOCHS[0])).toBe(
                'Approx. Temp: Infinite\nKey Events: The universe begins as an infinitely hot and dense point.',
            );
        });

        it('should append the prediction note to future epochs', () => {
            const text = describeCatalogEpoch(EPOCHS[7]);
            expect(text.endsWith(`\n\n${FUTURE_NOTE}`)).toBe(true);
            expect(text).not.toContain(HEAT_DEATH_NOTE);
        });

        it('should add the heat death caveat last', () => {
            const text = describeCatalogEpoch(EPOCHS[8]);
            expect(text.endsWith(`\n\n${FUTURE_NOTE}\n${HEAT_DEATH_NOTE}`)).toBe(true);
        });
    });

    describe('describeState', () => {
        it('should describe the singularity', () => {
            expect(describeState(stateAt(0))).toBe(
                [
                    'Time: 0 (Singularity?)',
                    'Approx Temp: Infinite',
                    'Approx Scale Factor (a): 1.000E-30 (a=1 today)',
                    'Dominant Phase: Inflation/Planck Era',
                    EXPLORER_HINT,
                ].join('\n'),
            );
        });

        it('should describe the present day', () => {
            const lines = describeState(stateAt(13.8e9)).split('\n');
            expect(lines[0]).toBe('Time: 13.80 billion years');
            expect(lines[2]).toBe('Approx Scale Factor (a): 1.000E+00 (a=1 today)');
            expect(lines[3]).toBe(`Dominant Phase: ${Phase.DarkEnergy}`);
        });

        it('should prefix the identified object', () => {
            const text = describeState(stateAt(0), 'Galaxy (Conceptual)');
            expect(text.startsWith('Identified: Galaxy (Conceptual)\n---\nTime: 0 (Singularity?)')).toBe(true);
        });
    });
});
