#!/usr/bin/env node
// CLI entry point for repos
// .env is loaded before any module reads the configuration

import { handleCliError } from './cli/utils/errors.js';

async function main(): Promise<void> {
  const { loadEnv } = await import('./config/env.js');
  loadEnv(process.cwd());

  const { runCli } = await import('./cli/index.js');
  await runCli(process.argv.slice(2));
}

// Reached when the configuration itself is invalid (modules throw while loading)
main().catch((error: unknown) => handleCliError(error));
