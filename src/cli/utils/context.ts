// Workspace and actor resolution shared by the commands

import { openWorkspace, Workspace, AIR_DIRECTORY } from '../../services/workspace.js';
import { SYSTEM_ACTOR } from '../../services/audit/audit-service.js';
import { StorageError } from '../../core/errors.js';
import { Logger, LogLevel } from '../../core/logger.js';

/**
 * Options every command accepts
 */
export interface BaseOptions {
  path: string;
  actor?: string;
}

let levelOverride: LogLevel | undefined;

/**
 * Log level chosen on the command line; wins over `logging.level`
 */
export function setLogLevelOverride(level: LogLevel | undefined): void {
  levelOverride = level;
}

/**
 * Opens the workspace at `root`, which must have been initialized.
 * The configured log level applies unless --verbose or --quiet was given.
 */
export async function loadWorkspace(root: string): Promise<Workspace> {
  const ws = openWorkspace(root);
  if (!(await ws.fileStore.isInitialized())) {
    throw new StorageError(`No ${AIR_DIRECTORY} directory in ${root}; run "air init" first`, { root });
  }
  Logger.configure({ level: levelOverride ?? (await ws.configService.getLogLevel()) });
  return ws;
}

/**
 * Actor recorded in the audit log: --actor, else the git user, else "system"
 */
export async function resolveActor(ws: Workspace, explicit: string | undefined): Promise<string> {
  const given = explicit?.trim();
  if (given) {
    return given;
  }
  return (await ws.promptService.getGitUserName()) ?? SYSTEM_ACTOR;
}
