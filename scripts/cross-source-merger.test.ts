import { describe, expect, test } from 'vitest';

import { mergeObservations, valuesAgree } from './cross-source-merger.ts';
import type { CanonicalObservation } from './lab-schema.ts';

function observation(overrides: Partial<CanonicalObservation> = {}): CanonicalObservation {
    return {
        analyte: 'Hemoglobin',
        code: 'HGB',
        recognized: true,
        originalName: 'Hemoglobin',
        value: 13.2,
        unit: 'g/dL',
        referenceLow: 13.5,
        referenceHigh: 17.5,
        rangeSource: 'report',
        status: 'unknown',
        sources: ['pattern'],
        conflict: false,
        alternates: [],
        ...overrides,
    };
}

describe('valuesAgree', () => {
    test('uses a relative tolerance', () => {
        expect(valuesAgree(13.2, 13.2, 0.01)).toBe(true);
        expect(valuesAgree(100, 100.9, 0.01)).toBe(true);
        expect(valuesAgree(100, 102, 0.01)).toBe(false);
        expect(valuesAgree(4.1, 41, 0.01)).toBe(false);
        expect(valuesAgree(0, 0, 0)).toBe(true);
    });
});

describe('mergeObservations', () => {
    test('merges agreeing readings into one observation from both pathways', () => {
        const merged = mergeObservations([
            [observation({ sources: ['vision'], originalName: 'HGB' })],
            [observation()],
        ]);

        expect(merged).toEqual([observation({ sources: ['vision', 'pattern'] })]);
    });

    test('prefers the pattern value and keeps the vision value on conflict', () => {
        const merged = mergeObservations([
            [observation({ analyte: 'Potassium', value: 4.1, unit: 'mmol/L', sources: ['pattern'] })],
            [observation({ analyte: 'Potassium', value: 41, unit: 'mmol/L', sources: ['vision'] })],
        ]);

        expect(merged).toHaveLength(1);
        expect(merged[0].value).toBe(4.1);
        expect(merged[0].conflict).toBe(true);
        expect(merged[0].sources).toEqual(['vision', 'pattern']);
        expect(merged[0].alternates).toEqual([{ source: 'vision', value: 41, unit: 'mmol/L' }]);
    });

    test('counts a unit mismatch as disagreement', () => {
        const merged = mergeObservations([
            [observation()],
            [observation({ unit: 'furlongs', sources: ['vision'] })],
        ]);

        expect(merged[0].conflict).toBe(true);
        expect(merged[0].unit).toBe('g/dL');
        expect(merged[0].alternates).toEqual([{ source: 'vision', value: 13.2, unit: 'furlongs' }]);
    });

    test('takes a printed range from vision when pattern only had the knowledge-base range', () => {
        const merged = mergeObservations([
            [observation({ rangeSource: 'knowledge-base' })],
            [observation({ referenceLow: 12, referenceHigh: 16, sources: ['vision'] })],
        ]);

        expect(merged[0].referenceLow).toBe(12);
        expect(merged[0].referenceHigh).toBe(16);
        expect(merged[0].rangeSource).toBe('report');
    });

    test('ignores a printed vision range in a different unit', () => {
        const merged = mergeObservations([
            [
                observation({
                    analyte: 'Glucose',
                    code: 'GLU',
                    value: 95,
                    unit: 'mg/dL',
                    referenceLow: 70,
                    referenceHigh: 100,
                    rangeSource: 'knowledge-base',
                }),
            ],
            [
                observation({
                    analyte: 'Glucose',
                    code: 'GLU',
                    value: 0.95,
                    unit: 'g/L',
                    referenceLow: 0.7,
                    referenceHigh: 1,
                    sources: ['vision'],
                }),
            ],
        ]);

        expect(merged).toHaveLength(1);
        expect(merged[0].value).toBe(95);
        expect(merged[0].referenceLow).toBe(70);
        expect(merged[0].referenceHigh).toBe(100);
        expect(merged[0].rangeSource).toBe('knowledge-base');
        expect(merged[0].conflict).toBe(true);
    });

    test('keeps the pattern range when both pathways read one from the report', () => {
        const merged = mergeObservations([
            [observation()],
            [observation({ referenceLow: 12, referenceHigh: 16, sources: ['vision'] })],
        ]);

        expect(merged[0].referenceLow).toBe(13.5);
        expect(merged[0].referenceHigh).toBe(17.5);
    });

    test('does not depend on the order of the input lists', () => {
        const pattern = [observation(), observation({ analyte: 'Glucose', code: 'GLU', value: 95, unit: 'mg/dL' })];
        const vision = [
            observation({ analyte: 'Potassium', code: 'K', value: 4.1, unit: 'mmol/L', sources: ['vision'] }),
            observation({ value: 13.9, sources: ['vision'] }),
        ];

        const forward = mergeObservations([pattern, vision]);
        const backward = mergeObservations([vision, pattern]);

        expect(backward).toEqual(forward);
        expect(forward.map(item => item.analyte)).toEqual(['Hemoglobin', 'Glucose', 'Potassium']);
    });

    test('passes a single pathway through unchanged', () => {
        const single = observation({ sources: ['vision'] });
        const merged = mergeObservations([[single], []]);
        expect(merged).toHaveLength(1);
        expect(merged[0]).toBe(single);
    });

    test('keeps the most confident duplicate within one pathway', () => {
        const merged = mergeObservations([
            [observation({ value: 13.2, confidence: 0.6 }), observation({ value: 13.4, confidence: 0.9 })],
        ]);

        expect(merged).toHaveLength(1);
        expect(merged[0].value).toBe(13.4);
        expect(merged[0].alternates).toEqual([{ source: 'pattern', value: 13.2, unit: 'g/dL' }]);
    });

    test('keeps the first duplicate when no confidence is given', () => {
        const merged = mergeObservations([[observation({ value: 13.2 }), observation({ value: 14 })]]);
        expect(merged[0].value).toBe(13.2);
        expect(merged[0].alternates).toEqual([{ source: 'pattern', value: 14, unit: 'g/dL' }]);
    });

    test('groups analytes case-insensitively', () => {
        const merged = mergeObservations([
            [observation({ analyte: 'Zonulin', recognized: false, sources: ['pattern'] })],
            [observation({ analyte: 'zonulin', recognized: false, sources: ['vision'] })],
        ]);
        expect(merged).toHaveLength(1);
        expect(merged[0].analyte).toBe('Zonulin');
    });
});
