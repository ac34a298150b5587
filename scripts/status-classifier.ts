import type { CanonicalObservation, ObservationStatus } from './lab-schema.ts';

/**
 * Bounds are inclusive. Anything without both bounds, and every unrecognized analyte, stays
 * `unknown`; a missing range is a valid outcome rather than an error.
 */
export function classifyStatus(
    observation: Pick<CanonicalObservation, 'recognized' | 'value' | 'referenceLow' | 'referenceHigh'>,
): ObservationStatus {
    if (!observation.recognized) {
        return 'unknown';
    }

    const { value, referenceLow, referenceHigh } = observation;
    if (referenceLow === undefined || referenceHigh === undefined) {
        return 'unknown';
    }
    if (value < referenceLow) return 'low';
    if (value > referenceHigh) return 'high';
    return 'normal';
}

export function classifyObservations(observations: CanonicalObservation[]): CanonicalObservation[] {
    return observations.map(observation => ({
        ...observation,
        status: classifyStatus(observation),
    }));
}
