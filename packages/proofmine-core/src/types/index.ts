import { z } from 'zod';

export const DEFAULT_MARKERS = [
    'verus!',
    '#[verus::',
    'requires',
    'ensures',
    'decreases',
    'invariant',
    'ghost',
    'proof',
    'spec',
    'exec',
    'reveal',
    'opens_invariants',
] as const;

export const DiscoverySchema = z.object({
    extension: z.string().min(1).default('rs'),
    exclude_dirs: z.array(z.string()).optional().default([
        'target',
        'tests',
        'examples',
        'benches',
        'docs',
        'vendor',
        '.git',
    ]),
});

export const HeuristicSchema = z.object({
    // Empty markers would match every file
    markers: z.array(z.string().min(1)).min(1).optional().default([...DEFAULT_MARKERS]),
    import_keyword: z.string().min(1).default('use'),
});

export const IsolationSchema = z.object({
    block_opener: z.string().min(1).default('verus!'),
    temp_prefix: z.string().min(1).default('verus_extract_'),
    entry_file: z.string().min(1).default('src/lib.rs'),
    crate_name: z.string().min(1).default('verus_extract'),
    library: z.string().min(1).default('verus'),
});

export const VerifierSchema = z.object({
    command: z.string().min(1).default('verus'),
    args: z.array(z.string()).optional().default(['--verify', '--crate-type=lib']),
    timeout_seconds: z.number().positive().default(30),
});

export const ConfigSchema = z.object({
    version: z.number().default(1),
    discovery: DiscoverySchema.optional().default({}),
    heuristic: HeuristicSchema.optional().default({}),
    isolation: IsolationSchema.optional().default({}),
    verifier: VerifierSchema.optional().default({}),
    output: z.object({
        manifest_name: z.string().min(1).default('manifest.jsonl'),
        include_code: z.boolean().default(false),
    }).optional().default({}),
    run: z.object({
        concurrency: z.number().int().min(1).default(1),
    }).optional().default({}),
});

export type DiscoveryConfig = z.infer<typeof DiscoverySchema>;
export type HeuristicConfig = z.infer<typeof HeuristicSchema>;
export type IsolationConfig = z.infer<typeof IsolationSchema>;
export type VerifierConfig = z.infer<typeof VerifierSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export const ExtractionStatusSchema = z.enum(['skipped', 'verified', 'failed', 'timeout', 'error']);
export type ExtractionStatus = z.infer<typeof ExtractionStatusSchema>;

/** One manifest line. `code` is only present for verified records written with code included. */
export const ManifestEntrySchema = z.object({
    source_path: z.string(),
    status: ExtractionStatusSchema,
    message: z.string(),
    dependencies: z.array(z.string()),
    verify_time_ms: z.number().int().nullable(),
    code: z.string().optional(),
});
export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

export interface ExtractionRecord {
    sourcePath: string;
    status: ExtractionStatus;
    message: string;
    /** Original file text; set only when status is `verified`. */
    code?: string;
    dependencies: string[];
    verifyTimeMs: number | null;
}

export interface Snippet {
    sourcePath: string;
    text: string;
    tokenScore: number;
    dependencies: string[];
}

export type RunSummary = Record<ExtractionStatus, number> & { total: number };
