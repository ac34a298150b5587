import fs from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, describe, expect, test, vi } from 'vitest';

import type { ReportFile } from '../../scripts/lab-schema.ts';
import { routeApiRequest } from './index.ts';
import { listReportJsonFiles, loadReportFiles, readReportFile } from './reports.ts';

function reportFile(reportId: string, importedAt: string): ReportFile {
    return {
        reportId,
        sourceFile: `/reports/${reportId}.pdf`,
        importedAt,
        pathways: {
            vision: { status: 'skipped', candidates: 0 },
            pattern: { status: 'ok', candidates: 1 },
        },
        observations: [
            {
                analyte: 'Potassium',
                code: 'K',
                recognized: true,
                originalName: 'Potassium',
                value: 4.1,
                unit: 'mmol/L',
                referenceLow: 3.5,
                referenceHigh: 5,
                rangeSource: 'knowledge-base',
                status: 'normal',
                sources: ['pattern'],
                conflict: false,
                alternates: [],
            },
        ],
        rejected: [],
        summary: { total: 1, normal: 1, low: 0, high: 0, unknown: 0, unrecognized: 0, conflicts: 0 },
    };
}

const tempDirs: string[] = [];

function makeDataDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lab-server-'));
    tempDirs.push(dir);
    fs.mkdirSync(path.join(dir, 'archive'));
    fs.writeFileSync(
        path.join(dir, 'report_2026-01-10_cbc.json'),
        JSON.stringify(reportFile('2026-01-10_cbc', '2026-01-10T08:00:00.000Z')),
    );
    fs.writeFileSync(
        path.join(dir, 'archive', 'report_2026-02-20_lipids.json'),
        JSON.stringify(reportFile('2026-02-20_lipids', '2026-02-20T08:00:00.000Z')),
    );
    fs.writeFileSync(path.join(dir, 'report_2026-03-01_broken.json'), '{"reportId": 1}');
    fs.writeFileSync(path.join(dir, 'notes.json'), '{}');
    return dir;
}

afterEach(() => {
    vi.restoreAllMocks();
    for (const dir of tempDirs.splice(0)) {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

describe('listReportJsonFiles', () => {
    test('finds report files recursively', () => {
        const dir = makeDataDir();
        expect(listReportJsonFiles(dir).map(file => path.basename(file)).sort()).toEqual([
            'report_2026-01-10_cbc.json',
            'report_2026-02-20_lipids.json',
            'report_2026-03-01_broken.json',
        ]);
    });

    test('returns nothing for a missing directory', () => {
        expect(listReportJsonFiles(path.join(os.tmpdir(), 'lab-server-missing-dir'))).toEqual([]);
    });
});

describe('readReportFile', () => {
    test('returns the validated report', () => {
        const dir = makeDataDir();
        expect(readReportFile(path.join(dir, 'report_2026-01-10_cbc.json'))?.reportId).toBe('2026-01-10_cbc');
    });

    test('logs the failing field of an invalid report', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const filePath = path.join(makeDataDir(), 'report_2026-03-01_broken.json');

        expect(readReportFile(filePath)).toBeUndefined();
        expect(errorSpy).toHaveBeenCalledWith(
            expect.stringContaining(
                `Skipping invalid report file: ${filePath} (reportId: Expected string, received number;`,
            ),
        );
    });

    test('logs files that are not JSON', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const filePath = path.join(makeDataDir(), 'report_2026-04-01_truncated.json');
        fs.writeFileSync(filePath, '{"reportId":');

        expect(readReportFile(filePath)).toBeUndefined();
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(errorSpy.mock.calls[0][0]).toMatch(/^Skipping unreadable report file: /);
    });
});

describe('loadReportFiles', () => {
    test('loads valid reports newest first and skips invalid ones', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const dir = makeDataDir();

        const reports = loadReportFiles(dir);

        expect(reports.map(report => report.reportId)).toEqual(['2026-02-20_lipids', '2026-01-10_cbc']);
        expect(errorSpy).toHaveBeenCalledTimes(1);
    });
});

describe('routeApiRequest', () => {
    test('answers status checks', () => {
        expect(routeApiRequest({ method: 'GET', url: '/status', dataDir: os.tmpdir() })).toEqual({
            status: 200,
            body: { ok: true },
        });
    });

    test('lists reports', () => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        const dir = makeDataDir();
        const response = routeApiRequest({ method: 'GET', url: '/reports?limit=5', dataDir: dir });

        expect(response.status).toBe(200);
        expect(response.body.items).toHaveLength(2);
    });

    test('returns 404 for anything else', () => {
        expect(routeApiRequest({ method: 'GET', url: '/observations', dataDir: os.tmpdir() })).toEqual({
            status: 404,
            body: { ok: false, error: 'Not found' },
        });
        expect(routeApiRequest({ method: 'POST', url: '/reports', dataDir: os.tmpdir() }).status).toBe(404);
    });
});
