#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@proofmine/core';
import { extractCommand, type ExtractOptions } from './commands/extract.js';
import { summaryCommand, type SummaryOptions } from './commands/summary.js';
import { doctorCommand } from './commands/doctor.js';
import { DEFAULT_OUT_DIR, EXIT_INTERNAL_ERROR } from './commands/constants.js';
import { getCliVersion } from './utils/cli-version.js';

const program = new Command();

program
    .name('proofmine')
    .description('Harvest formally verified snippets from a source tree')
    .version(getCliVersion());

program
    .command('extract', { isDefault: true })
    .description('Verify every annotated source file and write manifest.jsonl')
    .option('--repo <path>', 'Repository root to scan', process.cwd())
    .option('--out <path>', 'Output directory for the manifest', DEFAULT_OUT_DIR)
    .option('--limit <n>', 'Process at most n files, in sorted order')
    .option('--timeout <seconds>', 'Wall-clock bound for each verifier run')
    .option('--verifier <command>', 'Verifier executable name or path')
    .option('--concurrency <n>', 'Files verified in parallel')
    .option('--include-code', 'Write the source of verified files into the manifest')
    .option('-c, --config <path>', 'Path to a proofmine.yml')
    .option('-v, --verbose', 'Debug logging on stderr')
    .addHelpText('after', `
Examples:
  $ proofmine --repo ../verus-lib --limit 20
  $ proofmine extract --out data/snippets --timeout 60
  $ proofmine --verifier ~/verus/source/target-verus/release/verus --concurrency 4
    `)
    .action(async (options: ExtractOptions) => {
        await extractCommand(process.cwd(), options);
    });

program
    .command('summary')
    .description('Count records per status in an existing manifest')
    .argument('<manifest>', 'Path to manifest.jsonl')
    .option('--json', 'Print the counts as JSON')
    .action(async (manifest: string, options: SummaryOptions) => {
        await summaryCommand(process.cwd(), manifest, options);
    });

program
    .command('doctor')
    .description('Check that the configured verifier can be found')
    .option('--repo <path>', 'Repository whose proofmine.yml to read')
    .option('-c, --config <path>', 'Path to a proofmine.yml')
    .option('--verifier <command>', 'Verifier executable name or path')
    .action(async (options: { repo?: string; config?: string; verifier?: string }) => {
        await doctorCommand(process.cwd(), options);
    });

program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red(`\n❌ FATAL ERROR: ${errorMessage(error)}`));
    process.exit(EXIT_INTERNAL_ERROR);
});
