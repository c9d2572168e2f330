/*
 * command-line entry point
 */

import { main } from 'cli.ts'

import log from 'utils/logger.ts'

main(process.argv.slice(2), process.stdin, process.stdout).then(
  code => { process.exitCode = code; },
  (e: unknown) => {
    log.error('fibgame crashed', e);
    process.exitCode = 1;
  },
);
