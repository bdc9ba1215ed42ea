#!/usr/bin/env node
import 'dotenv/config';
import { writeFile } from 'node:fs/promises';
import { runCli } from './cli/run.js';

process.exitCode = await runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  writeFile: (path, contents) => writeFile(path, contents, 'utf8'),
});
