import type { CatalogEpoch, EpochDescriptor } from '../types';
import { FUTURE_NOTE, HEAT_DEATH_NOTE } from '../constants';
import { formatExplorerTime, formatScientific, formatTemperature } from './time';

export const EXPLORER_HINT = 'Right-Click object to Identify. Scroll to Zoom. Drag to Pan.';

export const describeCatalogEpoch = (epoch: CatalogEpoch): string => {
    let info = `Approx. Temp: ${epoch.temperatureLabel}\nKey Events: ${epoch.description}`;
    if (epoch.isFuture) {
        info += `\n\n${FUTURE_NOTE}`;
        if (epoch.id === 'heat-death') info += `\n${HEAT_DEATH_NOTE}`;
    }
    return info;
};

export const describeState = (descriptor: EpochDescriptor, identified: string | null = null): string => {
    const lines = [
        `Time: ${formatExplorerTime(descriptor.timeYears)}`,
        `Approx Temp: ${formatTemperature(descriptor.temperatureKelvin)}`,
        `Approx Scale Factor (a): ${formatScientific(descriptor.scaleFactor, 3, true)} (a=1 today)`,
        `Dominant Phase: ${descriptor.phase}`,
        EXPLORER_HINT,
    ];
    const body = lines.join('\n');
    return identified ? `Identified: ${identified}\n---\n${body}` : body;
};
