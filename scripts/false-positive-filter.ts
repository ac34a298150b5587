import {
    isCanonicalUnit,
    resolveAnalyte,
    type AnalyteEntry,
    type KnowledgeBase,
} from './knowledge-base.ts';
import type { CanonicalObservation, RejectedCandidate, RejectionReason } from './lab-schema.ts';

export const DEFAULT_MAGNITUDE_BOUND_FACTOR = 1000;

export type FilterRejectionReason = Extract<
    RejectionReason,
    'noise-name' | 'date-like-value' | 'non-positive-value' | 'implausible-magnitude'
>;

export type FilterOptions = {
    /** Upper plausibility bound, as a multiple of the reference high, for entries without explicit bounds. */
    magnitudeBoundFactor?: number;
};

export type FilterOutcome = {
    kept: CanonicalObservation[];
    rejected: RejectedCandidate[];
};

export function isNoiseName(name: string, knowledgeBase: KnowledgeBase): boolean {
    if (!/\p{L}/u.test(name)) {
        return true;
    }
    return knowledgeBase.noisePatterns.some(pattern => pattern.test(name));
}

/** Day-of-month or year-like integers: the usual shape of a date fragment read as a value. */
export function isDateLikeValue(value: number): boolean {
    if (!Number.isInteger(value)) {
        return false;
    }
    return (value >= 1 && value <= 31) || (value >= 1900 && value <= 2100);
}

export function getPlausibleBounds(
    entry: AnalyteEntry,
    magnitudeBoundFactor: number,
): { min?: number; max?: number } {
    const min = entry.plausible?.min;
    const explicitMax = entry.plausible?.max;
    if (explicitMax !== undefined) {
        return { min, max: explicitMax };
    }
    if (entry.high !== undefined && entry.high > 0) {
        return { min, max: entry.high * magnitudeBoundFactor };
    }
    return { min };
}

function findEntry(observation: CanonicalObservation, knowledgeBase: KnowledgeBase): AnalyteEntry | undefined {
    return observation.recognized ? resolveAnalyte(knowledgeBase, observation.analyte) : undefined;
}

export function findRejectionReason(
    observation: CanonicalObservation,
    knowledgeBase: KnowledgeBase,
    { magnitudeBoundFactor = DEFAULT_MAGNITUDE_BOUND_FACTOR }: FilterOptions = {},
): FilterRejectionReason | undefined {
    if (isNoiseName(observation.originalName, knowledgeBase)) {
        return 'noise-name';
    }

    const entry = findEntry(observation, knowledgeBase);
    if (!entry) {
        return isDateLikeValue(observation.value) ? 'date-like-value' : undefined;
    }

    if (!entry.allowNonPositive && observation.value <= 0) {
        return 'non-positive-value';
    }

    // Bounds are expressed in the canonical unit; values kept in an unknown unit are not comparable.
    if (isCanonicalUnit(entry, observation.unit)) {
        const { min, max } = getPlausibleBounds(entry, magnitudeBoundFactor);
        if ((max !== undefined && observation.value > max) || (min !== undefined && observation.value < min)) {
            return 'implausible-magnitude';
        }
    }

    return undefined;
}

/** Runs on one pathway's observations at a time, preserving their order. */
export function filterFalsePositives(
    observations: CanonicalObservation[],
    knowledgeBase: KnowledgeBase,
    options: FilterOptions = {},
): FilterOutcome {
    const kept: CanonicalObservation[] = [];
    const rejected: RejectedCandidate[] = [];

    for (const observation of observations) {
        const reason = findRejectionReason(observation, knowledgeBase, options);
        if (!reason) {
            kept.push(observation);
            continue;
        }
        rejected.push({
            stage: 'filter',
            source: observation.sources[0],
            name: observation.originalName,
            value: observation.value,
            reason,
        });
    }

    return { kept, rejected };
}
