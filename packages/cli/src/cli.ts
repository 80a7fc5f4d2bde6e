#!/usr/bin/env node
import { errorMessage } from '@siteaudit/core';

import { createProgram } from './lib/program.js';

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const program = createProgram({
    cwd: process.cwd(),
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    interactive: Boolean(process.stderr.isTTY),
    signal: controller.signal,
  });

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error(`error: ${errorMessage(err)}`);
  process.exitCode = 2;
});
