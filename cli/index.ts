#!/usr/bin/env node
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { logger, setLogLevel } from '../utils/logger';
import { runCli } from './app';
import { promptHidden, readAllStdin } from './prompt';

// Load .env from the working directory, if there is one
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
  // the logger read LOG_LEVEL before .env was loaded
  if (process.env.LOG_LEVEL) {
    setLogLevel(process.env.LOG_LEVEL);
  }
  logger.debug(`[dotenv] Loaded .env file from: ${envPath}`);
}

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2), {
    io: {
      out: line => process.stdout.write(`${line}\n`),
      err: line => process.stderr.write(`${line}\n`),
      readStdin: readAllStdin,
    },
    promptPassphrase: process.stdin.isTTY ? promptHidden : null,
  });
  process.exitCode = exitCode;
}

main().catch(error => {
  logger.error('[CLI] Fatal error:', error);
  process.exitCode = 1;
});
