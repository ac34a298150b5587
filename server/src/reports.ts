import fs from 'fs';
import path from 'path';

import { reportFileSchema, type ReportFile } from '../../scripts/lab-schema.ts';

const REPORT_FILE_NAME = /^report_.*\.json$/i;

function isDirectory(dirPath: string): boolean {
    return fs.existsSync(dirPath) && fs.statSync(dirPath).isDirectory();
}

/** Every `report_*.json` under `dataDir`, nested folders included, in reverse path order. */
export function listReportJsonFiles(dataDir: string): string[] {
    if (!isDirectory(dataDir)) return [];

    return fs
        .readdirSync(dataDir, { recursive: true, encoding: 'utf8' })
        .filter(relativePath => REPORT_FILE_NAME.test(path.basename(relativePath)))
        .map(relativePath => path.join(dataDir, relativePath))
        .filter(filePath => fs.statSync(filePath).isFile())
        .sort()
        .reverse();
}

function describeProblem(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** Parses and validates one stored report; problems are logged and yield undefined. */
export function readReportFile(filePath: string): ReportFile | undefined {
    let json: unknown;
    try {
        json = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
        console.error(`Skipping unreadable report file: ${filePath} (${describeProblem(error)})`);
        return undefined;
    }

    const parsed = reportFileSchema.safeParse(json);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        console.error(`Skipping invalid report file: ${filePath} (${problems.join('; ')})`);
        return undefined;
    }
    return parsed.data;
}

/** Newest import first; reports imported at the same instant fall back to their id. */
export function loadReportFiles(dataDir: string): ReportFile[] {
    return listReportJsonFiles(dataDir)
        .map(readReportFile)
        .filter((report): report is ReportFile => report !== undefined)
        .sort((a, b) => b.importedAt.localeCompare(a.importedAt) || a.reportId.localeCompare(b.reportId));
}
