// --- CONSTANTS ---
export const SECONDS_PER_YEAR = 365.25 * 24 * 3600; // 31,557,600
export const DAYS_PER_YEAR = 365.25;

// The stepper catalog was written against a 365-day year.
const CATALOG_SECONDS_PER_YEAR = 365 * 24 * 60 * 60;
const CATALOG_DAYS_PER_YEAR = 365;

// --- CONVERSIONS ---

export const yearsFromSeconds = (seconds: number): number => seconds / SECONDS_PER_YEAR;

export const secondsFromYears = (years: number): number => years * SECONDS_PER_YEAR;

export const yearsFromLogSeconds = (logSeconds: number): number =>
    yearsFromSeconds(Math.pow(10, logSeconds));

/**
 * Inverse of yearsFromLogSeconds. Non-positive times have no logarithm,
 * so they map to -Infinity and callers clamp to their slider range.
 */
export const logSecondsFromYears = (years: number): number => {
    if (!(years > 0)) return -Infinity;
    return Math.log10(secondsFromYears(years));
};

// --- FORMATTING ---

/**
 * Exponential notation with a signed, at least two-digit exponent
 * (`1.50e+09`, `3.17E-51`).
 */
export const formatScientific = (value: number, digits: number, uppercase = false): string => {
    if (!Number.isFinite(value)) return String(value);
    const [mantissa, exponent] = value.toExponential(digits).split('e');
    const sign = exponent.startsWith('-') ? '-' : '+';
    const magnitude = exponent.replace(/^[+-]/, '').padStart(2, '0');
    return `${mantissa}${uppercase ? 'E' : 'e'}${sign}${magnitude}`;
};

/** Coarse labels used by the epoch stepper. */
export const formatCatalogTime = (years: number): string => {
    if (years === 0) return '0 (Singularity)';
    if (years < 1e-6) return `${formatScientific(years * CATALOG_SECONDS_PER_YEAR, 1)} seconds`;
    if (years < 1) return `${(years * CATALOG_DAYS_PER_YEAR).toFixed(1)} days`;
    if (years < 1000) return `${years.toFixed(0)} years`;
    if (years < 1e6) return `${(years / 1e3).toFixed(1)} thousand years`;
    if (years < 1e9) return `${(years / 1e6).toFixed(1)} million years`;
    return `${(years / 1e9).toFixed(2)} billion years`;
};

/** Finer labels used by the explorer slider, which reaches trillions of years. */
export const formatExplorerTime = (years: number): string => {
    if (!(years > 0)) return '0 (Singularity?)';
    if (years < 1 / SECONDS_PER_YEAR) return `${formatScientific(years * SECONDS_PER_YEAR, 2)} seconds`;
    if (years < 1 / DAYS_PER_YEAR) return `${(years * DAYS_PER_YEAR).toFixed(1)} days`;
    if (years < 1) return `${(years * DAYS_PER_YEAR).toFixed(0)} days`;
    if (years < 1000) return `${years.toFixed(1)} years`;
    if (years < 1e6) return `${(years / 1e3).toFixed(2)} thousand years`;
    if (years < 1e9) return `${(years / 1e6).toFixed(2)} million years`;
    if (years < 1e12) return `${(years / 1e9).toFixed(2)} billion years`;
    return `${(years / 1e12).toFixed(2)} trillion years`;
};

export const formatTemperature = (kelvin: number): string => {
    if (kelvin === Infinity) return 'Infinite';
    return `${formatScientific(kelvin, 2, true)} K`;
};
