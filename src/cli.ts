#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { resolveOptions, runCommand, probeCommand, reportFatalError } from './commands';
import { log } from './engine/logger';

import 'dotenv/config';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    config: { type: 'string', short: 'c' },
    'max-retries': { type: 'string', short: 'r' },
    delay: { type: 'string', short: 'd' },
    'artifact-dir': { type: 'string', short: 'o' },
    'run-id': { type: 'string' },
    'source-type': { type: 'string', default: 'postgresql' },
    'target-type': { type: 'string', default: 'postgresql' },
    verify: { type: 'boolean', default: false },
  },
});

const command = positionals[0] ?? 'run';

const printUsage = (): void => {
  console.info(`
Usage: tsx src/cli.ts <command> [options]

Commands:
  run      Probe both servers, dump the source, load into the destination (default)
  probe    Only check that both servers accept connections
  help     Show this message

Options:
  -c, --config <path>         INI file with [source_postgres] and [destination_postgres] (default: config.ini)
  -r, --max-retries <n>       Readiness checks per server before giving up (default: 5)
  -d, --delay <seconds>       Pause between readiness checks (default: 5)
  -o, --artifact-dir <dir>    Directory for the dump file (default: cwd)
  --run-id <id>               Names the dump file elt-<id>.sql (default: random UUID)
  --source-type <type>        Source dialect type (default: postgresql)
  --target-type <type>        Target dialect type (default: postgresql)
  --verify                    Compare public table counts after loading

Environment:
  ELT_CONFIG             Same as --config
  PROBE_MAX_RETRIES      Same as --max-retries
  PROBE_DELAY_SECONDS    Same as --delay
  ELT_ARTIFACT_DIR       Same as --artifact-dir
  ELT_VERIFY             Set to "true" for --verify
`);
};

const main = async (): Promise<void> => {
  switch (command) {
    case 'run':
      process.exitCode = await runCommand(resolveOptions(values));
      break;
    case 'probe':
      process.exitCode = await probeCommand(resolveOptions(values));
      break;
    case 'help':
      printUsage();
      break;
    default:
      printUsage();
      process.exit(1);
  }
};

main().catch((err: unknown) => {
  process.exit(reportFatalError(err, log));
});
