import { Command } from 'commander';

import { BACKEND_KINDS, DEFAULT_CONFIG, LOG_LEVELS, TRACE_FORMATS } from '@logscrub/core';

import { engineCommands } from './commands/engine.js';
import { profileCommands } from './commands/profile.js';
import { redactCommands } from './commands/redact.js';
import { traceCommands } from './commands/trace.js';

export { createBackend } from './backends.js';
export type { BackendContext } from './backends.js';

export function createCli(): Command {
  const program = new Command();
  program
    .name('logscrub')
    .description('Redact secrets and personal data from log files')
    .version('0.1.0');

  program
    .command('redact [paths...]')
    .description('Redact files, directories or stdin')
    .option('-p, --profile <ref>', 'Built-in profile name or profile file', DEFAULT_CONFIG.profile)
    .option('--auto-profile', 'Pick a built-in profile per file from its name')
    .option('-r, --recursive', 'Walk directories')
    .option('-o, --out-dir <dir>', 'Write sanitized files here instead of stdout')
    .option('-s, --structured <format>', 'Treat input as structured documents (json, yaml)')
    .option('-t, --trace <file>', 'Write the redaction trace log to a file')
    .option('--trace-format <format>', `Trace log format (${TRACE_FORMATS.join(', ')})`, DEFAULT_CONFIG.traceFormat)
    .option('-c, --concurrency <n>', 'Files processed at once', String(DEFAULT_CONFIG.concurrency))
    .option('-b, --backend <kind>', `Redaction backend (${BACKEND_KINDS.join(', ')})`, DEFAULT_CONFIG.backend)
    .option('--engine-path <path>', 'Executable used by the cli backend', DEFAULT_CONFIG.enginePath)
    .option('--timeout <ms>', 'Per-call timeout for the cli backend', String(DEFAULT_CONFIG.timeoutMs))
    .option('--log-level <level>', `Log level (${LOG_LEVELS.join(', ')})`, DEFAULT_CONFIG.logLevel)
    .option('--dry-run', 'Redact without writing anything; list per-file counts')
    .option('--preview', 'Show a line diff of every change instead of writing output')
    .option('--stats', 'Print per-rule redaction counts after the run')
    .option('--entropy-threshold <bits>', 'Override the profile entropy threshold')
    .option('--entropy-min-length <n>', 'Override the profile entropy minimum token length')
    .option('--disable-entropy', 'Turn off entropy detection')
    .option('--keys-to-redact <paths>', 'Extra comma-separated key paths for structured input')
    .action((paths: string[], options) => redactCommands.redact(paths, options));

  const profile = program.command('profile').description('Profile management');

  profile
    .command('list')
    .description('List the built-in profiles')
    .action(() => profileCommands.list());

  profile
    .command('show [ref]')
    .description('Show the effective profile after extends are resolved')
    .action((ref?: string) => profileCommands.show(ref));

  profile
    .command('lint <file>')
    .description('Validate a profile file')
    .action((file: string) => profileCommands.lint(file));

  profile
    .command('match <file>')
    .description('Show which built-in profile --auto-profile picks for a file')
    .action((file: string) => profileCommands.match(file));

  const trace = program.command('trace').description('Trace log tools');

  trace
    .command('verify <file> <digest>')
    .description('Check an exported trace log against its digest')
    .action((file: string, digest: string) => traceCommands.verify(file, digest));

  trace
    .command('summary <file>')
    .description('Count the redactions in an exported trace log')
    .action((file: string) => traceCommands.summary(file));

  program
    .command('engine <profile-ref>')
    .description('Serve one redaction request on stdin (used by the cli backend)')
    .option('--entropy-threshold <bits>', 'Override the profile entropy threshold')
    .option('--entropy-min-length <n>', 'Override the profile entropy minimum token length')
    .option('--disable-entropy', 'Turn off entropy detection')
    .option('--keys-to-redact <paths>', 'Extra comma-separated key paths for structured input')
    .action((profileRef: string, options) => engineCommands.run(profileRef, options));

  return program;
}
