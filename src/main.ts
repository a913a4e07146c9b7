#!/usr/bin/env node
import { run } from './app';

void run().then(code => {
  if (code !== 0) process.exitCode = code;
});
