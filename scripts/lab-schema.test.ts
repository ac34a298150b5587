import { describe, expect, test } from 'vitest';

import {
    buildReportFileName,
    buildReportS3Key,
    canonicalObservationSchema,
    formatPlainNumber,
    parseNumericToken,
    parseReferenceRangeBoundsFromText,
    slugifyForPath,
} from './lab-schema.ts';

describe('formatPlainNumber', () => {
    test('expands exponent notation', () => {
        expect(formatPlainNumber(1e-7)).toBe('0.0000001');
        expect(formatPlainNumber(-1.5e-7)).toBe('-0.00000015');
        expect(formatPlainNumber(2e21)).toBe('2000000000000000000000');
    });

    test('leaves ordinary numbers alone', () => {
        expect(formatPlainNumber(13.2)).toBe('13.2');
        expect(formatPlainNumber(7500)).toBe('7500');
    });
});

describe('parseNumericToken', () => {
    test('parses plain, grouped and decimal-comma numbers', () => {
        expect(parseNumericToken('13.2')).toBe(13.2);
        expect(parseNumericToken(' .5 ')).toBe(0.5);
        expect(parseNumericToken('1,234.5')).toBe(1234.5);
        expect(parseNumericToken('7,500')).toBe(7500);
        expect(parseNumericToken('4,5')).toBe(4.5);
        expect(parseNumericToken('-3')).toBe(-3);
    });

    test('rejects comparators, flags and text', () => {
        expect(parseNumericToken('<5')).toBeUndefined();
        expect(parseNumericToken('12H')).toBeUndefined();
        expect(parseNumericToken('Positive')).toBeUndefined();
        expect(parseNumericToken('')).toBeUndefined();
    });
});

describe('parseReferenceRangeBoundsFromText', () => {
    test('parses common bounded formats', () => {
        expect(parseReferenceRangeBoundsFromText('13.5 - 17.5')).toEqual({ low: 13.5, high: 17.5 });
        expect(parseReferenceRangeBoundsFromText('2,5–4,9')).toEqual({ low: 2.5, high: 4.9 });
        expect(parseReferenceRangeBoundsFromText('10 to 20')).toEqual({ low: 10, high: 20 });
        expect(parseReferenceRangeBoundsFromText('4,000 - 11,000')).toEqual({ low: 4000, high: 11000 });
    });

    test('parses one-sided comparators', () => {
        expect(parseReferenceRangeBoundsFromText('<= 120')).toEqual({ high: 120 });
        expect(parseReferenceRangeBoundsFromText('>= -3.2')).toEqual({ low: -3.2 });
        expect(parseReferenceRangeBoundsFromText('≤ 5')).toEqual({ high: 5 });
    });

    test('returns undefined for unsupported text', () => {
        expect(parseReferenceRangeBoundsFromText('see comment')).toBeUndefined();
        expect(parseReferenceRangeBoundsFromText('')).toBeUndefined();
    });
});

describe('report file naming', () => {
    test('slugifies source names', () => {
        expect(slugifyForPath('Müller Lab Report.PDF')).toBe('muller-lab-report-pdf');
        expect(slugifyForPath('***')).toBe('unknown-report');
    });

    test('builds file names and S3 keys', () => {
        expect(buildReportFileName({ date: '2026-03-01', sourceName: 'CBC March' })).toBe(
            'report_2026-03-01_cbc-march.json',
        );
        expect(buildReportS3Key('report.json', '/lab-reports/')).toBe('lab-reports/report.json');
        expect(buildReportS3Key('report.json', '')).toBe('report.json');
    });
});

describe('canonicalObservationSchema', () => {
    const observation = {
        analyte: 'Potassium',
        recognized: true,
        originalName: 'K+',
        value: 4.1,
        unit: 'mmol/L',
        referenceLow: 3.5,
        referenceHigh: 5,
        rangeSource: 'report',
        status: 'normal',
        sources: ['pattern'],
        conflict: false,
        alternates: [],
    };

    test('accepts a well-formed observation', () => {
        expect(canonicalObservationSchema.safeParse(observation).success).toBe(true);
    });

    test('rejects an inverted reference range', () => {
        const result = canonicalObservationSchema.safeParse({ ...observation, referenceLow: 6 });
        expect(result.success).toBe(false);
    });
});
