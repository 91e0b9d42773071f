import path from 'path';
import { writeManifest, serializeRecord, summarizeRecords, MANIFEST_NAME } from '../manifest/manifest.js';
import type { DiscoveryConfig, ExtractionRecord, RunSummary } from '../types/index.js';
import { FileScanner } from '../utils/scanner.js';
import { Logger } from '../utils/logger.js';

export interface RecordSource {
    attemptExtract(sourcePath: string): Promise<ExtractionRecord>;
}

export interface BatchOptions {
    repo: string;
    outDir: string;
    /** Process at most this many files, taken in sorted order. */
    limit?: number;
    concurrency?: number;
    discovery?: DiscoveryConfig;
    manifestName?: string;
    includeCode?: boolean;
    /** Called once per record, in sorted-path order, with its serialized line. */
    onRecord?: (record: ExtractionRecord, line: string) => void;
}

export interface BatchResult {
    records: ExtractionRecord[];
    manifestPath: string;
    summary: RunSummary;
    durationMs: number;
}

export class BatchRunner {
    constructor(private readonly source: RecordSource, private readonly options: BatchOptions) { }

    async discover(): Promise<string[]> {
        const scanOptions = this.options.discovery
            ? FileScanner.fromConfig(this.options.repo, this.options.discovery)
            : { cwd: this.options.repo };
        const files = await FileScanner.findFiles(scanOptions);
        if (this.options.limit === undefined) return files;
        return files.slice(0, Math.max(0, this.options.limit));
    }

    async run(): Promise<BatchResult> {
        const start = Date.now();
        const files = await this.discover();
        Logger.debug(`Discovered ${files.length} file(s) under ${path.resolve(this.options.repo)}`);

        const records: ExtractionRecord[] = [];
        let failure: unknown;
        try {
            await this.processAll(files, records);
        } catch (error) {
            failure = error;
        }

        // Everything processed before an abort still lands in the manifest
        const manifestPath = await writeManifest(this.options.outDir, records, {
            name: this.options.manifestName ?? MANIFEST_NAME,
            includeCode: this.options.includeCode,
        });
        if (failure !== undefined) {
            throw failure;
        }

        return {
            records,
            manifestPath,
            summary: summarizeRecords(records),
            durationMs: Date.now() - start,
        };
    }

    /**
     * Bounded worker pool. Finished records wait in `pending` until every
     * earlier file has been emitted, so output order never depends on timing.
     */
    private async processAll(files: string[], records: ExtractionRecord[]): Promise<void> {
        const concurrency = Math.max(1, Math.min(this.options.concurrency ?? 1, files.length));
        const pending = new Map<number, ExtractionRecord>();
        let nextIndex = 0;
        let nextToEmit = 0;
        let aborted = false;

        const emitReady = () => {
            let record = pending.get(nextToEmit);
            while (record) {
                pending.delete(nextToEmit);
                records.push(record);
                this.options.onRecord?.(record, serializeRecord(record, { includeCode: this.options.includeCode }));
                nextToEmit++;
                record = pending.get(nextToEmit);
            }
        };

        const worker = async () => {
            while (!aborted && nextIndex < files.length) {
                const index = nextIndex++;
                try {
                    pending.set(index, await this.source.attemptExtract(files[index]));
                    emitReady();
                } catch (error) {
                    aborted = true;
                    throw error;
                }
            }
        };

        const outcomes = await Promise.allSettled(Array.from({ length: concurrency }, () => worker()));
        for (const outcome of outcomes) {
            if (outcome.status === 'rejected') {
                throw outcome.reason;
            }
        }
    }
}
