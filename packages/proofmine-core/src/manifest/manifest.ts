import fs from 'fs-extra';
import path from 'path';
import { ManifestParseError } from '../errors.js';
import {
    ManifestEntrySchema,
    type ExtractionRecord,
    type ManifestEntry,
    type RunSummary,
} from '../types/index.js';

export const MANIFEST_NAME = 'manifest.jsonl';

export interface SerializeOptions {
    includeCode?: boolean;
}

export function toManifestEntry(record: ExtractionRecord, options: SerializeOptions = {}): ManifestEntry {
    const entry: ManifestEntry = {
        source_path: record.sourcePath,
        status: record.status,
        message: record.message,
        dependencies: record.dependencies,
        verify_time_ms: record.verifyTimeMs,
    };
    if (options.includeCode && record.code !== undefined) {
        entry.code = record.code;
    }
    return entry;
}

/** One JSON object, no trailing newline. Key order is fixed. */
export function serializeRecord(record: ExtractionRecord, options: SerializeOptions = {}): string {
    return JSON.stringify(toManifestEntry(record, options));
}

export function fromManifestEntry(entry: ManifestEntry): ExtractionRecord {
    const record: ExtractionRecord = {
        sourcePath: entry.source_path,
        status: entry.status,
        message: entry.message,
        dependencies: entry.dependencies,
        verifyTimeMs: entry.verify_time_ms,
    };
    if (entry.code !== undefined) {
        record.code = entry.code;
    }
    return record;
}

/**
 * Writes every record, one per line, to `<outDir>/<name>`, creating `outDir`
 * and its parents. Returns the manifest path.
 */
export async function writeManifest(
    outDir: string,
    records: ExtractionRecord[],
    options: SerializeOptions & { name?: string } = {}
): Promise<string> {
    await fs.ensureDir(outDir);
    const manifestPath = path.join(outDir, options.name ?? MANIFEST_NAME);
    const body = records.map(record => serializeRecord(record, options) + '\n').join('');
    await fs.writeFile(manifestPath, body, 'utf-8');
    return manifestPath;
}

export async function readManifest(manifestPath: string): Promise<ExtractionRecord[]> {
    const content = await fs.readFile(manifestPath, 'utf-8');
    const records: ExtractionRecord[] = [];

    content.split('\n').forEach((line, index) => {
        if (!line.trim()) return;
        let raw: unknown;
        try {
            raw = JSON.parse(line);
        } catch {
            throw new ManifestParseError(manifestPath, index + 1, 'not valid JSON');
        }
        const parsed = ManifestEntrySchema.safeParse(raw);
        if (!parsed.success) {
            const reason = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
            throw new ManifestParseError(manifestPath, index + 1, reason);
        }
        records.push(fromManifestEntry(parsed.data));
    });

    return records;
}

export function summarizeRecords(records: ExtractionRecord[]): RunSummary {
    const summary: RunSummary = { total: 0, skipped: 0, verified: 0, failed: 0, timeout: 0, error: 0 };
    for (const record of records) {
        summary.total++;
        summary[record.status]++;
    }
    return summary;
}
