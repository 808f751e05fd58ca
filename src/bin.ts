#!/usr/bin/env node
import dotenv from 'dotenv'; // Load environment variables from .env file
import { run } from './cli.js';
import { loadConfig } from './config.js';
import { createLogger } from './utils/logger.js';

dotenv.config();

const config = loadConfig();
const logger = createLogger(config);

process.exitCode = run(process.argv.slice(2), {
  stdout: text => process.stdout.write(text),
  logger,
  verify: config.verifyTrees,
});
