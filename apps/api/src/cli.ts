#!/usr/bin/env node
import dotenv from 'dotenv';
import fs from 'node:fs';
import { Command } from 'commander';
import { loadRentalConfig } from './config.js';
import { errorMessage } from './rental/errors.js';
import { RentalSession } from './rental/session.js';

dotenv.config();

function readRecords(file: string): unknown[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, { encoding: 'utf8' }));
  if (!Array.isArray(parsed)) {
    throw new Error(`${file} must contain a JSON array of listing records`);
  }
  return parsed;
}

function runAsk(question: string, file: string): string {
  const session = new RentalSession(loadRentalConfig());
  const { added, rejected } = session.ingest(readRecords(file));
  console.info('[ask] loaded listings', { file, added: added.length, rejected: rejected.length });
  return session.answer(question);
}

const program = new Command();
program.name('rent-insights').description('Answer rent questions over scraped listing records');

program
  .command('ask')
  .argument('<question>', 'question about rent, e.g. "average rent for 2 bedroom in Osu"')
  .requiredOption('-f, --file <path>', 'JSON array of raw listing records')
  .action((question: string, opts: { file: string }) => {
    try {
      console.log(runAsk(question, opts.file));
    } catch (err) {
      console.error('[ask] failed:', errorMessage(err));
      process.exitCode = 1;
    }
  });

program.parse(process.argv);
