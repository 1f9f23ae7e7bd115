#!/usr/bin/env node
import { getLogger } from './logger';
import { runCli } from './index';

runCli(process.argv).then(
  code => {
    process.exitCode = code;
  },
  error => {
    getLogger().fatal({ err: error }, 'Unexpected error.');
    process.exitCode = 1;
  }
);
