import { normalizeAnalyteKey } from './knowledge-base.ts';
import {
    EXTRACTION_SOURCES,
    type AlternateValue,
    type CanonicalObservation,
    type ExtractionSource,
} from './lab-schema.ts';

export const DEFAULT_AGREEMENT_TOLERANCE = 0.01;

export type MergeOptions = {
    /** Relative difference under which two pathway values count as the same reading. */
    agreementTolerance?: number;
};

type SourceGroup = Record<ExtractionSource, CanonicalObservation[]>;

export function analyteKey(observation: Pick<CanonicalObservation, 'analyte'>): string {
    return normalizeAnalyteKey(observation.analyte);
}

export function valuesAgree(left: number, right: number, tolerance: number): boolean {
    if (left === right) {
        return true;
    }
    const scale = Math.max(Math.abs(left), Math.abs(right));
    return Math.abs(left - right) <= tolerance * scale;
}

function toAlternate(observation: CanonicalObservation): AlternateValue {
    return {
        source: observation.sources[0],
        value: observation.value,
        unit: observation.unit,
    };
}

function primarySource(observation: CanonicalObservation): ExtractionSource {
    return observation.sources.includes('pattern') ? 'pattern' : observation.sources[0];
}

/**
 * Highest confidence wins within one pathway, first occurrence on ties. Candidates without a
 * confidence rank below any that carry one.
 */
function pickWithinSource(observations: CanonicalObservation[]): {
    primary: CanonicalObservation;
    alternates: AlternateValue[];
} {
    let primaryIndex = 0;
    observations.forEach((observation, index) => {
        const best = observations[primaryIndex].confidence ?? -1;
        if ((observation.confidence ?? -1) > best) {
            primaryIndex = index;
        }
    });

    return {
        primary: observations[primaryIndex],
        alternates: observations
            .filter((_observation, index) => index !== primaryIndex)
            .map(toAlternate),
    };
}

function mergeAcrossSources({
    pattern,
    vision,
    agreementTolerance,
}: {
    pattern: CanonicalObservation;
    vision: CanonicalObservation;
    agreementTolerance: number;
}): { merged: CanonicalObservation; visionAlternate: AlternateValue | undefined } {
    const agree =
        pattern.unit === vision.unit &&
        valuesAgree(pattern.value, vision.value, agreementTolerance);

    // A range printed on the report beats a knowledge-base fallback; between two printed ranges the pattern one wins.
    // The merged value is the pattern one, so a vision range only applies when it is in the same unit.
    const rangeDonor =
        pattern.rangeSource !== 'report' && vision.rangeSource === 'report' && vision.unit === pattern.unit
            ? vision
            : pattern;

    const { referenceLow: _patternLow, referenceHigh: _patternHigh, ...patternRest } = pattern;
    const merged: CanonicalObservation = {
        ...patternRest,
        ...(rangeDonor.referenceLow !== undefined ? { referenceLow: rangeDonor.referenceLow } : {}),
        ...(rangeDonor.referenceHigh !== undefined ? { referenceHigh: rangeDonor.referenceHigh } : {}),
        rangeSource: rangeDonor.rangeSource,
        sources: [...EXTRACTION_SOURCES],
        conflict: !agree,
    };

    return {
        merged,
        visionAlternate: agree ? undefined : toAlternate(vision),
    };
}

/**
 * Merges the filtered observations of both pathways into one list with one entry per analyte.
 * Pathway roles come from each observation's provenance, so argument order does not matter.
 * Output follows first appearance over pattern observations, then vision observations.
 */
export function mergeObservations(
    lists: CanonicalObservation[][],
    { agreementTolerance = DEFAULT_AGREEMENT_TOLERANCE }: MergeOptions = {},
): CanonicalObservation[] {
    const all = lists.flat();
    const ordered = [
        ...all.filter(observation => primarySource(observation) === 'pattern'),
        ...all.filter(observation => primarySource(observation) !== 'pattern'),
    ];

    const groups = new Map<string, SourceGroup>();
    for (const observation of ordered) {
        const key = analyteKey(observation);
        let group = groups.get(key);
        if (!group) {
            group = { vision: [], pattern: [] };
            groups.set(key, group);
        }
        group[primarySource(observation)].push(observation);
    }

    const merged: CanonicalObservation[] = [];
    for (const group of groups.values()) {
        const pattern = group.pattern.length > 0 ? pickWithinSource(group.pattern) : undefined;
        const vision = group.vision.length > 0 ? pickWithinSource(group.vision) : undefined;

        if (pattern && vision) {
            const { merged: observation, visionAlternate } = mergeAcrossSources({
                pattern: pattern.primary,
                vision: vision.primary,
                agreementTolerance,
            });
            merged.push({
                ...observation,
                alternates: [
                    ...pattern.primary.alternates,
                    ...pattern.alternates,
                    ...(visionAlternate ? [visionAlternate] : []),
                    ...vision.primary.alternates,
                    ...vision.alternates,
                ],
            });
            continue;
        }

        const single = pattern ?? vision;
        if (!single) continue;
        merged.push(
            single.alternates.length > 0
                ? { ...single.primary, alternates: [...single.primary.alternates, ...single.alternates] }
                : single.primary,
        );
    }

    return merged;
}
