import fs from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, describe, expect, test } from 'vitest';

import {
    createKnowledgeBase,
    KnowledgeBaseLoadError,
    loadKnowledgeBase,
    normalizeAnalyteKey,
    normalizeUnitKey,
    resolveAnalyte,
    resolveUnit,
} from './knowledge-base.ts';
import { PROJECT_KNOWLEDGE_BASE_PATH } from './project-paths.ts';

const knowledgeBase = loadKnowledgeBase(PROJECT_KNOWLEDGE_BASE_PATH);

function requireEntry(name: string) {
    const entry = resolveAnalyte(knowledgeBase, name);
    if (!entry) throw new Error(`Missing knowledge base entry: ${name}`);
    return entry;
}

describe('normalizeAnalyteKey', () => {
    test('ignores case, spacing and markdown residue', () => {
        expect(normalizeAnalyteKey('  **HGB**: ')).toBe('hgb');
        expect(normalizeAnalyteKey('• Serum   Potassium')).toBe('serum potassium');
    });
});

describe('normalizeUnitKey', () => {
    test('collapses micro prefixes and spacing', () => {
        expect(normalizeUnitKey('µmol/L')).toBe('umol/l');
        expect(normalizeUnitKey('mcg/dL')).toBe('ug/dl');
        expect(normalizeUnitKey('mmol / L')).toBe('mmol/l');
    });
});

describe('resolveAnalyte', () => {
    test('matches names, codes and aliases', () => {
        expect(resolveAnalyte(knowledgeBase, 'Hemoglobin')?.name).toBe('Hemoglobin');
        expect(resolveAnalyte(knowledgeBase, 'haemoglobin')?.name).toBe('Hemoglobin');
        expect(resolveAnalyte(knowledgeBase, 'HGB')?.name).toBe('Hemoglobin');
        expect(resolveAnalyte(knowledgeBase, 'Sodium:')?.name).toBe('Sodium');
        expect(resolveAnalyte(knowledgeBase, 'Glucose, Fasting')?.name).toBe('Glucose');
    });

    test('returns undefined for unknown names', () => {
        expect(resolveAnalyte(knowledgeBase, 'Unobtainium')).toBeUndefined();
        expect(resolveAnalyte(knowledgeBase, '  ')).toBeUndefined();
    });
});

describe('resolveUnit', () => {
    test('resolves canonical units, equivalents and conversions', () => {
        const glucose = requireEntry('Glucose');
        const potassium = requireEntry('Potassium');
        expect(resolveUnit(glucose, 'mg/dl')).toEqual({ unit: 'mg/dL', factor: 1 });
        expect(resolveUnit(glucose, 'mmol/l')).toEqual({ unit: 'mg/dL', factor: 18.0182 });
        expect(resolveUnit(potassium, 'meq/L')).toEqual({ unit: 'mmol/L', factor: 1 });
    });

    test('returns undefined for units the entry does not know', () => {
        expect(resolveUnit(requireEntry('Glucose'), 'furlongs')).toBeUndefined();
    });
});

describe('createKnowledgeBase', () => {
    test('freezes the loaded entries', () => {
        expect(Object.isFrozen(knowledgeBase)).toBe(true);
        expect(Object.isFrozen(knowledgeBase.analytes[0])).toBe(true);
    });

    test('rejects a name claimed by two analytes', () => {
        expect(() =>
            createKnowledgeBase({
                version: 'test',
                analytes: [
                    { name: 'Alpha', unit: 'x', aliases: ['shared'] },
                    { name: 'Beta', unit: 'y', aliases: ['shared'] },
                ],
            }),
        ).toThrow('Name "shared" is claimed by both Alpha and Beta');
    });

    test('rejects invalid noise patterns', () => {
        expect(() =>
            createKnowledgeBase({
                version: 'test',
                noisePatterns: ['('],
                analytes: [{ name: 'Alpha', unit: 'x' }],
            }),
        ).toThrow('Invalid noise pattern: (');
    });

    test('rejects entries whose low exceeds high', () => {
        expect(() =>
            createKnowledgeBase({
                version: 'test',
                analytes: [{ name: 'Alpha', unit: 'x', low: 5, high: 1 }],
            }),
        ).toThrow(/Alpha: low must not exceed high/);
    });

    test('rejects an empty analyte list', () => {
        expect(() => createKnowledgeBase({ version: 'test', analytes: [] })).toThrow(KnowledgeBaseLoadError);
    });
});

describe('loadKnowledgeBase', () => {
    const tempDirs: string[] = [];

    afterEach(() => {
        for (const dir of tempDirs.splice(0)) {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    function makeTempDir(): string {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lab-kb-'));
        tempDirs.push(dir);
        return dir;
    }

    test('fails when the file is missing', () => {
        const missingPath = path.join(makeTempDir(), 'missing.json');
        expect(() => loadKnowledgeBase(missingPath)).toThrow(`Could not read knowledge base (${missingPath})`);
    });

    test('fails on malformed JSON', () => {
        const filePath = path.join(makeTempDir(), 'broken.json');
        fs.writeFileSync(filePath, '{ "version": ', 'utf8');
        expect(() => loadKnowledgeBase(filePath)).toThrow(KnowledgeBaseLoadError);
        expect(() => loadKnowledgeBase(filePath)).toThrow('Knowledge base is not valid JSON');
    });

    test('loads a minimal valid file', () => {
        const filePath = path.join(makeTempDir(), 'kb.json');
        fs.writeFileSync(
            filePath,
            JSON.stringify({ version: 'v1', analytes: [{ name: 'Alpha', code: 'ALP', unit: 'U/L' }] }),
            'utf8',
        );
        const loaded = loadKnowledgeBase(filePath);
        expect(loaded.version).toBe('v1');
        expect(resolveAnalyte(loaded, 'alp')?.name).toBe('Alpha');
    });
});
