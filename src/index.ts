// Main entry point for library usage
// The repos command line lives in ./cli.ts.

export * from './core/types.js';
export * from './core/errors.js';

export { config, buildConfig, reloadConfig, type Config } from './config/index.js';
export { loadEnv } from './config/env.js';

export { ExecFileRunner, summarizeOutput, type CommandRunner, type CommandResult, type RunOptions } from './utils/exec.js';
export { GitClient } from './utils/git.js';

export {
  parseGroupConfig,
  loadGroupConfig,
  findGroup,
  selectGroups,
  groupFolder,
  expectedRepoPaths,
  normalizeHighland,
} from './services/group-config.service.js';
export { GhCliClient, type GitHubClient } from './services/github.service.js';
export { RemoteIndex } from './services/remote-index.service.js';
export { planSync } from './services/planner.service.js';
export { RepoSyncService, type RepoSyncer } from './services/repo-sync.service.js';
export { executeSync } from './services/sync-executor.service.js';
export { cleanupDeletedRepos, type CleanupResult } from './services/cleanup.service.js';
export { buildDiffReport, scanLocalRepos } from './services/report.service.js';
export { syncGroups, checkGroups, type SyncRunResult, type CheckRunResult } from './services/workflow.service.js';

export { readLongDescription, FALLBACK_DESCRIPTION, VERSION } from './package-info.js';
export { createProgram, runCli } from './cli/index.js';
