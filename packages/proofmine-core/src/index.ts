export * from './types/index.js';
export * from './errors.js';
export * from './config.js';
export * from './utils/logger.js';
export { FileScanner, compareRelativePaths } from './utils/scanner.js';
export type { ScannerOptions } from './utils/scanner.js';
export { TokenHeuristic, countOccurrences } from './heuristic/token-heuristic.js';
export { extractDependencies } from './heuristic/dependencies.js';
export { SnippetIsolator, withIsolatedUnit, DEFAULT_ISOLATION } from './isolation/isolator.js';
export type { IsolatedUnit, Isolator } from './isolation/isolator.js';
export type { ExternalVerifier, VerificationResult, CompletedVerification, TimedOutVerification, TerminatedVerification } from './verifier/types.js';
export { ProcessVerifier, DEFAULT_VERIFIER_ARGS } from './verifier/process-verifier.js';
export { isExecutableBinary, resolveExecutable } from './verifier/executable.js';
export { ExtractionOrchestrator, classify, SKIPPED_MESSAGE, TIMEOUT_MESSAGE } from './extraction/orchestrator.js';
export type { OrchestratorOptions } from './extraction/orchestrator.js';
export { BatchRunner } from './extraction/batch-runner.js';
export type { BatchOptions, BatchResult, RecordSource } from './extraction/batch-runner.js';
export {
    writeManifest,
    readManifest,
    serializeRecord,
    toManifestEntry,
    fromManifestEntry,
    summarizeRecords,
    MANIFEST_NAME,
} from './manifest/manifest.js';
export type { SerializeOptions } from './manifest/manifest.js';
