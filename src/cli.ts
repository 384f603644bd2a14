#!/usr/bin/env node
import { config } from 'dotenv';
import { runApp } from './app.js';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { createTerminal } from './ui/terminal.js';

config();

const terminal = createTerminal();

runApp({ config: loadConfig(), terminal })
  .then(() => {
    terminal.close();
  })
  .catch((err: unknown) => {
    console.error(`❌ Unexpected error: ${describeError(err)}`);
    terminal.close();
    process.exitCode = 1;
  });
