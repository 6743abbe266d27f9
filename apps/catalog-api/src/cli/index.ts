#!/usr/bin/env -S node --import tsx
import 'dotenv/config';

import { loadEnv } from '@app/config';
import { createLogger } from '@app/logger';

import { runCli } from './run.js';

const env = loadEnv();
const logger = createLogger({
  service: 'catalog-cli',
  env: env.nodeEnv,
  level: env.logLevel,
  destination: process.stderr,
});

process.exitCode = await runCli(process.argv.slice(2), { env, logger });
