// The `air` command-line program

import { Command } from 'commander';
import { LogLevel } from '../core/logger.js';
import { setLogLevelOverride } from './utils/context.js';
import { registerInitCommand } from './commands/init.js';
import { registerCreateCommand } from './commands/create.js';
import { registerArtifactCommands } from './commands/artifact.js';
import { registerEditCommands } from './commands/edit.js';
import { registerLifecycleCommands } from './commands/lifecycle.js';
import { registerLinkCommands } from './commands/link.js';
import { registerGraphCommands } from './commands/graph.js';
import { registerImpactCommand } from './commands/impact.js';
import { registerVerifyCommand } from './commands/verify.js';
import { registerPlaybookCommands } from './commands/playbook.js';

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('air')
    .description('AirSDLC artifact tracker - phase-gated PRDs, DAAs, TIPs, RFCs, ADRs, Bolts and post-mortems')
    .version('0.1.0')
    .option('-v, --verbose', 'Log debug output')
    .option('-q, --quiet', 'Only log errors')
    .hook('preAction', () => {
      const { verbose, quiet } = program.opts<GlobalOptions>();
      setLogLevelOverride(verbose ? LogLevel.DEBUG : quiet ? LogLevel.ERROR : undefined);
    });

  registerInitCommand(program);
  registerCreateCommand(program);
  registerArtifactCommands(program);
  registerEditCommands(program);
  registerLifecycleCommands(program);
  registerLinkCommands(program);
  registerGraphCommands(program);
  registerImpactCommand(program);
  registerVerifyCommand(program);
  registerPlaybookCommands(program);

  return program;
}
