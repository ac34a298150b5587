import fs from 'fs';

import { z } from 'zod';

import { collapseWhitespace } from './lab-schema.ts';

const unitConversionSchema = z.object({
    unit: z.string().trim().min(1),
    /** canonical value = reported value × factor */
    factor: z.number().positive().finite(),
});

const analyteEntrySchema = z
    .object({
        name: z.string().trim().min(1),
        code: z.string().trim().min(1).optional(),
        category: z.string().trim().min(1).optional(),
        unit: z.string().trim(),
        low: z.number().finite().optional(),
        high: z.number().finite().optional(),
        aliases: z.array(z.string().trim().min(1)).default([]),
        unitEquivalents: z.array(z.string().trim().min(1)).default([]),
        conversions: z.array(unitConversionSchema).default([]),
        plausible: z
            .object({
                min: z.number().finite().optional(),
                max: z.number().finite().optional(),
            })
            .optional(),
        allowNonPositive: z.boolean().default(false),
    })
    .refine(
        entry => entry.low === undefined || entry.high === undefined || entry.low <= entry.high,
        entry => ({ message: `${entry.name}: low must not exceed high` }),
    );

const knowledgeBaseFileSchema = z.object({
    version: z.string().trim().min(1),
    noisePatterns: z.array(z.string().min(1)).default([]),
    analytes: z.array(analyteEntrySchema).min(1),
});

export type AnalyteEntry = z.infer<typeof analyteEntrySchema>;
export type KnowledgeBaseData = z.input<typeof knowledgeBaseFileSchema>;

export type KnowledgeBase = {
    readonly version: string;
    readonly analytes: readonly AnalyteEntry[];
    readonly noisePatterns: readonly RegExp[];
    readonly lookup: ReadonlyMap<string, AnalyteEntry>;
};

export type UnitResolution = {
    unit: string;
    factor: number;
};

export class KnowledgeBaseLoadError extends Error {
    readonly sourcePath: string | undefined;

    constructor(message: string, sourcePath?: string, options?: ErrorOptions) {
        super(sourcePath ? `${message} (${sourcePath})` : message, options);
        this.name = 'KnowledgeBaseLoadError';
        this.sourcePath = sourcePath;
    }
}

/** Lookup key for analyte names: case-insensitive, whitespace-collapsed, markdown and bullet residue stripped. */
export function normalizeAnalyteKey(name: string): string {
    return collapseWhitespace(name.normalize('NFKC'))
        .replace(/^[\s*_:•.-]+|[\s*_:•.]+$/g, '')
        .toLowerCase();
}

/** Lookup key for units: case and whitespace are ignored, `µ`/`μ`/`mc` prefixes collapse to `u`. */
export function normalizeUnitKey(unit: string): string {
    return unit
        .normalize('NFKC')
        .toLowerCase()
        .replace(/\s+/g, '')
        .replace(/[µμ]/g, 'u')
        .replace(/(^|\/)mc(?=[a-z])/g, '$1u');
}

function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

function compileNoisePatterns(patterns: string[], sourcePath?: string): RegExp[] {
    return patterns.map(pattern => {
        try {
            return new RegExp(pattern, 'i');
        } catch (error) {
            throw new KnowledgeBaseLoadError(`Invalid noise pattern: ${pattern}`, sourcePath, { cause: error });
        }
    });
}

function buildLookup(analytes: AnalyteEntry[], sourcePath?: string): Map<string, AnalyteEntry> {
    const lookup = new Map<string, AnalyteEntry>();
    for (const entry of analytes) {
        const names = [entry.name, entry.code, ...entry.aliases].filter(
            (name): name is string => name !== undefined,
        );
        for (const name of names) {
            const key = normalizeAnalyteKey(name);
            if (!key) continue;
            const existing = lookup.get(key);
            if (existing && existing !== entry) {
                throw new KnowledgeBaseLoadError(
                    `Name "${name}" is claimed by both ${existing.name} and ${entry.name}`,
                    sourcePath,
                );
            }
            lookup.set(key, entry);
        }
    }
    return lookup;
}

/**
 * Builds the read-only knowledge base from in-memory data. The result and every entry in it
 * are frozen; callers share one instance for the lifetime of the process.
 */
export function createKnowledgeBase(data: unknown, sourcePath?: string): KnowledgeBase {
    const parsed = knowledgeBaseFileSchema.safeParse(data);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new KnowledgeBaseLoadError(`Invalid knowledge base: ${issues}`, sourcePath);
    }

    const knowledgeBase: KnowledgeBase = {
        version: parsed.data.version,
        analytes: parsed.data.analytes,
        noisePatterns: compileNoisePatterns(parsed.data.noisePatterns, sourcePath),
        lookup: buildLookup(parsed.data.analytes, sourcePath),
    };
    deepFreeze(parsed.data);
    return Object.freeze(knowledgeBase);
}

export function loadKnowledgeBase(filePath: string): KnowledgeBase {
    let raw: string;
    try {
        raw = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
        throw new KnowledgeBaseLoadError('Could not read knowledge base', filePath, { cause: error });
    }

    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new KnowledgeBaseLoadError('Knowledge base is not valid JSON', filePath, { cause: error });
    }

    return createKnowledgeBase(data, filePath);
}

/** Exact match on canonical name or code first, then aliases; both go through the same key. */
export function resolveAnalyte(knowledgeBase: KnowledgeBase, rawName: string): AnalyteEntry | undefined {
    const key = normalizeAnalyteKey(rawName);
    if (!key) {
        return undefined;
    }
    return knowledgeBase.lookup.get(key);
}

export function resolveUnit(entry: AnalyteEntry, rawUnit: string): UnitResolution | undefined {
    const key = normalizeUnitKey(rawUnit);
    if (key === normalizeUnitKey(entry.unit)) {
        return { unit: entry.unit, factor: 1 };
    }
    if (entry.unitEquivalents.some(unit => normalizeUnitKey(unit) === key)) {
        return { unit: entry.unit, factor: 1 };
    }
    const conversion = entry.conversions.find(item => normalizeUnitKey(item.unit) === key);
    if (conversion) {
        return { unit: entry.unit, factor: conversion.factor };
    }
    return undefined;
}

export function isCanonicalUnit(entry: AnalyteEntry, unit: string): boolean {
    return normalizeUnitKey(unit) === normalizeUnitKey(entry.unit);
}
