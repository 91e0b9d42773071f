import { execa } from 'execa';
import type { IsolatedUnit } from '../isolation/isolator.js';
import type { VerifierConfig } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { VerifierNotFoundError } from '../errors.js';
import { resolveExecutable } from './executable.js';
import type { ExternalVerifier, VerificationResult } from './types.js';

export const DEFAULT_VERIFIER_ARGS = ['--verify', '--crate-type=lib'];

/**
 * Runs the verifier as a child process: `<command> <args...> <entry-file>`.
 * On timeout execa sends SIGTERM, then SIGKILL if the child lingers, so no
 * process outlives the call.
 */
export class ProcessVerifier implements ExternalVerifier {
    readonly command: string;
    private readonly args: string[];

    constructor(command = 'verus', args: string[] = DEFAULT_VERIFIER_ARGS) {
        this.command = command;
        this.args = args;
    }

    static fromConfig(config: VerifierConfig): ProcessVerifier {
        return new ProcessVerifier(config.command, config.args);
    }

    /** Throws VerifierNotFoundError when the command does not resolve. */
    preflight(env: NodeJS.ProcessEnv = process.env): string {
        const resolved = resolveExecutable(this.command, env);
        if (!resolved) {
            throw new VerifierNotFoundError(this.command);
        }
        return resolved;
    }

    async verify(unit: IsolatedUnit, timeoutSeconds: number): Promise<VerificationResult> {
        Logger.debug(`Running ${this.command} ${[...this.args, unit.entryFile].join(' ')}`);
        const result = await execa(this.command, [...this.args, unit.entryFile], {
            cwd: unit.root,
            timeout: Math.round(timeoutSeconds * 1000),
            reject: false,
            stdin: 'ignore',
        });

        if (result.timedOut) {
            return { kind: 'timed_out', timeoutSeconds };
        }
        if (result.signal !== undefined) {
            return { kind: 'terminated', signal: result.signal, stdout: result.stdout, stderr: result.stderr };
        }
        if (result.exitCode === undefined) {
            throw new Error(`Verifier ${this.command} could not be started`);
        }

        return {
            kind: 'completed',
            exitCode: result.exitCode,
            stdout: result.stdout,
            stderr: result.stderr,
        };
    }
}
