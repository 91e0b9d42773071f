import chalk from 'chalk';
import path from 'path';
import { execa } from 'execa';
import { loadConfig, resolveExecutable, errorMessage } from '@proofmine/core';

export interface VerifierStatus {
    command: string;
    resolved: string | null;
    version: string;
}

async function readVersion(binaryPath: string): Promise<string> {
    const result = await execa(binaryPath, ['--version'], { reject: false, timeout: 10_000, stdin: 'ignore' });
    if (result.exitCode !== 0) return 'unknown';
    return result.stdout.split(/\r?\n/)[0]?.trim() || 'unknown';
}

export async function checkVerifier(command: string, env: NodeJS.ProcessEnv = process.env): Promise<VerifierStatus> {
    const resolved = resolveExecutable(command, env);
    if (!resolved) {
        return { command, resolved: null, version: 'unknown' };
    }
    return { command, resolved, version: await readVersion(resolved) };
}

export async function doctorCommand(cwd: string, options: { repo?: string; config?: string; verifier?: string } = {}): Promise<VerifierStatus | undefined> {
    console.log(chalk.bold.cyan('\nProofmine Doctor\n'));

    const repo = path.resolve(cwd, options.repo ?? '.');
    let command: string;
    try {
        const config = await loadConfig(repo, options.config ? path.resolve(cwd, options.config) : undefined);
        command = options.verifier ?? config.verifier.command;
        console.log(`  - Verifier args: ${chalk.dim(config.verifier.args.join(' '))}`);
        console.log(`  - Timeout: ${chalk.dim(`${config.verifier.timeout_seconds}s`)}`);
    } catch (error) {
        console.log(chalk.red(`✘ Config: ${errorMessage(error)}\n`));
        return undefined;
    }

    const status = await checkVerifier(command);
    if (!status.resolved) {
        console.log(chalk.red(`✘ ${command} not found in PATH`));
        console.log(chalk.dim('  Extraction will refuse to start until the verifier resolves.\n'));
        return status;
    }

    console.log(chalk.green(`  ✓ ${command} → ${status.resolved} ${chalk.dim(`(${status.version})`)}\n`));
    return status;
}
