#!/usr/bin/env node
import { homedir } from 'node:os';
import dotenv from 'dotenv';
import { createProgram } from './program.js';

dotenv.config();

const program = createProgram({
  stdin: process.stdin,
  stdinIsTTY: Boolean(process.stdin.isTTY),
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  homeDir: homedir(),
  exit: (code) => {
    process.exitCode = code;
  },
});

await program.parseAsync(process.argv);
