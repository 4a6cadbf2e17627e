#!/usr/bin/env node
import { start } from './main.js';

start().catch(() => {
  process.exitCode = 1;
});
