#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { registerIngestCommand } from './commands/ingest';

const program = new Command();

program
  .name('ingest')
  .description('Scan directories for data files, extract their metadata and record the run')
  .version('1.0.0');

registerIngestCommand(program);

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : 'Unknown error';
  console.error(`Ingestion failed: ${message}`);
  process.exitCode = 1;
});
