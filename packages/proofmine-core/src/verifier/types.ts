import type { IsolatedUnit } from '../isolation/isolator.js';

export interface CompletedVerification {
    kind: 'completed';
    exitCode: number;
    stdout: string;
    stderr: string;
}

export interface TimedOutVerification {
    kind: 'timed_out';
    timeoutSeconds: number;
}

/** The verifier ran and was killed by a signal (crash, abort, OOM killer). */
export interface TerminatedVerification {
    kind: 'terminated';
    signal: string;
    stdout: string;
    stderr: string;
}

export type VerificationResult = CompletedVerification | TimedOutVerification | TerminatedVerification;

/**
 * Seam around the external verification tool. A non-zero exit or a kill by
 * signal is a normal result; implementations only throw when the tool could not be run.
 */
export interface ExternalVerifier {
    readonly command: string;
    verify(unit: IsolatedUnit, timeoutSeconds: number): Promise<VerificationResult>;
}
