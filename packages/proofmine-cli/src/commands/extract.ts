import path from 'path';
import chalk from 'chalk';
import {
    BatchRunner,
    ConfigError,
    ExtractionOrchestrator,
    Logger,
    LogLevel,
    ProcessVerifier,
    SnippetIsolator,
    TokenHeuristic,
    VerifierNotFoundError,
    errorMessage,
    loadConfig,
    type BatchResult,
    type Config,
} from '@proofmine/core';
import { DEFAULT_OUT_DIR, EXIT_CONFIG_ERROR, EXIT_INTERNAL_ERROR } from './constants.js';

export interface ExtractOptions {
    repo?: string;
    out?: string;
    limit?: string;
    timeout?: string;
    verifier?: string;
    concurrency?: string;
    includeCode?: boolean;
    config?: string;
    verbose?: boolean;
}

function parsePositive(name: string, value: string, integer: boolean): number {
    const parsed = Number(value);
    const valid = integer ? Number.isInteger(parsed) && parsed >= 0 : Number.isFinite(parsed) && parsed > 0;
    if (value.trim() === '' || !valid) {
        throw new ConfigError(`Invalid --${name} value: ${value}`);
    }
    return parsed;
}

/** CLI flags win over proofmine.yml. */
export function applyOverrides(config: Config, options: ExtractOptions): Config {
    const merged: Config = {
        ...config,
        verifier: { ...config.verifier },
        output: { ...config.output },
        run: { ...config.run },
    };
    if (options.timeout !== undefined) {
        merged.verifier.timeout_seconds = parsePositive('timeout', options.timeout, false);
    }
    if (options.verifier !== undefined) {
        merged.verifier.command = options.verifier;
    }
    if (options.concurrency !== undefined) {
        merged.run.concurrency = Math.max(1, parsePositive('concurrency', options.concurrency, true));
    }
    if (options.includeCode) {
        merged.output.include_code = true;
    }
    return merged;
}

/**
 * Scans `--repo`, verifies every candidate snippet, streams one JSON line per
 * file to stdout, and writes the manifest into `--out`.
 */
export async function extractCommand(cwd: string, options: ExtractOptions = {}): Promise<BatchResult | undefined> {
    if (options.verbose) {
        Logger.setLevel(LogLevel.DEBUG);
    }

    const repo = path.resolve(cwd, options.repo ?? '.');
    const outDir = path.resolve(cwd, options.out ?? DEFAULT_OUT_DIR);

    let config: Config;
    let limit: number | undefined;
    let verifier: ProcessVerifier;
    try {
        limit = options.limit !== undefined ? parsePositive('limit', options.limit, true) : undefined;
        config = applyOverrides(await loadConfig(repo, options.config ? path.resolve(cwd, options.config) : undefined), options);
        verifier = ProcessVerifier.fromConfig(config.verifier);
        const resolved = verifier.preflight();
        Logger.debug(`Using verifier at ${resolved}`);
    } catch (error) {
        if (error instanceof ConfigError || error instanceof VerifierNotFoundError) {
            Logger.error(error.message);
            if (error instanceof VerifierNotFoundError) {
                console.error(chalk.dim('  Install the verifier, add it to PATH, or pass --verifier <path>.'));
            }
            process.exit(EXIT_CONFIG_ERROR);
            return undefined;
        }
        throw error;
    }

    const orchestrator = new ExtractionOrchestrator({
        heuristic: new TokenHeuristic(config.heuristic.markers),
        isolator: new SnippetIsolator(config.isolation),
        verifier,
        timeoutSeconds: config.verifier.timeout_seconds,
        importKeyword: config.heuristic.import_keyword,
    });

    const runner = new BatchRunner(orchestrator, {
        repo,
        outDir,
        limit,
        concurrency: config.run.concurrency,
        discovery: config.discovery,
        manifestName: config.output.manifest_name,
        includeCode: config.output.include_code,
        onRecord: (_record, line) => {
            process.stdout.write(line + '\n');
        },
    });

    try {
        const result = await runner.run();
        const { summary } = result;
        Logger.info(
            `Processed ${summary.total} file(s): ${chalk.green(`${summary.verified} verified`)}, ` +
            `${chalk.red(`${summary.failed} failed`)}, ${chalk.yellow(`${summary.timeout} timeout`)}, ` +
            `${summary.skipped} skipped, ${summary.error} error in ${(result.durationMs / 1000).toFixed(1)}s`
        );
        Logger.info(`Manifest written to ${result.manifestPath}`);
        return result;
    } catch (error) {
        Logger.error(`Extraction aborted: ${errorMessage(error)}`);
        process.exit(EXIT_INTERNAL_ERROR);
        return undefined;
    }
}
