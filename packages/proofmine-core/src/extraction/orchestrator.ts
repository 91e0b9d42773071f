import { errorMessage } from '../errors.js';
import { extractDependencies } from '../heuristic/dependencies.js';
import { TokenHeuristic } from '../heuristic/token-heuristic.js';
import { withIsolatedUnit, type Isolator } from '../isolation/isolator.js';
import type { ExtractionRecord, Snippet } from '../types/index.js';
import { FileScanner } from '../utils/scanner.js';
import { Logger } from '../utils/logger.js';
import type { ExternalVerifier, VerificationResult } from '../verifier/types.js';

export const SKIPPED_MESSAGE = 'no_verus_tokens';
export const TIMEOUT_MESSAGE = 'verification_timeout';

export interface OrchestratorOptions {
    heuristic: TokenHeuristic;
    isolator: Isolator;
    verifier: ExternalVerifier;
    timeoutSeconds: number;
    importKeyword?: string;
    readFile?: (filePath: string) => Promise<string>;
}

/**
 * Turns one source file into one classified record:
 * skipped, verified, failed, timeout, or error when the attempt itself broke.
 */
export class ExtractionOrchestrator {
    private readonly readFile: (filePath: string) => Promise<string>;

    constructor(private readonly options: OrchestratorOptions) {
        this.readFile = options.readFile ?? (filePath => FileScanner.readFile(filePath));
    }

    async attemptExtract(sourcePath: string): Promise<ExtractionRecord> {
        let text: string;
        try {
            text = await this.readFile(sourcePath);
        } catch (error) {
            Logger.warn(`Could not read ${sourcePath}: ${errorMessage(error)}`);
            return errorRecord(sourcePath, `read_error: ${errorMessage(error)}`, [], null);
        }

        if (!this.options.heuristic.containsMarker(text)) {
            return {
                sourcePath,
                status: 'skipped',
                message: SKIPPED_MESSAGE,
                dependencies: [],
                verifyTimeMs: null,
            };
        }

        const snippet: Snippet = {
            sourcePath,
            text,
            tokenScore: this.options.heuristic.score(text),
            dependencies: extractDependencies(text, this.options.importKeyword),
        };

        let verifyTimeMs: number | null = null;
        try {
            return await withIsolatedUnit(this.options.isolator, snippet.text, async unit => {
                const started = Date.now();
                try {
                    const result = await this.options.verifier.verify(unit, this.options.timeoutSeconds);
                    return classify(snippet, result, Date.now() - started);
                } finally {
                    verifyTimeMs = Date.now() - started;
                }
            });
        } catch (error) {
            Logger.warn(`Extraction failed for ${sourcePath}: ${errorMessage(error)}`);
            return errorRecord(sourcePath, errorMessage(error), snippet.dependencies, verifyTimeMs);
        }
    }
}

export function classify(snippet: Snippet, result: VerificationResult, verifyTimeMs: number): ExtractionRecord {
    const base = {
        sourcePath: snippet.sourcePath,
        dependencies: snippet.dependencies,
        verifyTimeMs,
    };

    if (result.kind === 'timed_out') {
        return { ...base, status: 'timeout', message: TIMEOUT_MESSAGE };
    }
    if (result.kind === 'completed' && result.exitCode === 0) {
        return {
            ...base,
            status: 'verified',
            message: `verified with score=${snippet.tokenScore}`,
            code: snippet.text,
        };
    }

    const diagnostic = result.stderr.trim() || result.stdout.trim();
    const fallback = result.kind === 'terminated'
        ? `verifier terminated by ${result.signal}`
        : `verifier exited with code ${result.exitCode}`;
    return { ...base, status: 'failed', message: diagnostic || fallback };
}

function errorRecord(
    sourcePath: string,
    message: string,
    dependencies: string[],
    verifyTimeMs: number | null
): ExtractionRecord {
    return { sourcePath, status: 'error', message, dependencies, verifyTimeMs };
}
