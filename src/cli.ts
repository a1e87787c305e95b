#!/usr/bin/env node
import { createProgram } from './cli/program.js';
import { env } from './config/env.js';
import { MockDataError, getDefaultLookupStore } from './domain/mock-data.js';
import { logger } from './observability/logger.js';
import { createTriageRunner } from './services/triage.js';

function main(): void {
  const store = getDefaultLookupStore();
  const program = createProgram({
    store,
    runTriage: createTriageRunner(store),
    sampleOrderLimit: env.triage.sampleOrderLimit,
    write: (line) => {
      process.stdout.write(`${line}\n`);
    },
  });

  program.parse(process.argv);
}

try {
  main();
} catch (error: unknown) {
  if (error instanceof MockDataError) {
    logger.fatal({ err: error, file: error.file }, 'Lookup data is malformed');
  } else {
    logger.fatal({ err: error }, 'Triage command failed');
  }
  process.exitCode = 1;
}
