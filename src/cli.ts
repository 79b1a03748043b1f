#!/usr/bin/env node
import { runCli } from './activation/createProgram';

async function main(): Promise<void> {
  try {
    process.exitCode = await runCli(process.argv, {
      env: process.env,
      stdout: process.stdout,
      stderr: process.stderr,
    });
  } catch (error) {
    console.error('transome failed unexpectedly');
    if (error) {
      console.error(error);
    }
    process.exit(1);
  }
}

void main();
