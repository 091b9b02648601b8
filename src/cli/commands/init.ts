// Init command for the AirSDLC tracker CLI

import { Command } from 'commander';
import { openWorkspace, AIR_DIRECTORY } from '../../services/workspace.js';
import { TYPE_DIRECTORIES, PLAYBOOK_DIRECTORY, AUDIT_DIRECTORY } from '../../services/storage/file-store.js';
import { handleError, success } from '../utils/error-handler.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description(`Initialize the ${AIR_DIRECTORY} directory structure`)
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (options: { path: string }) => {
      try {
        const ws = openWorkspace(options.path);
        await ws.fileStore.initialize();

        success(`Initialized ${ws.storeDir}`);
        console.log('  Created directories:');
        for (const dir of [...Object.values(TYPE_DIRECTORIES), PLAYBOOK_DIRECTORY, AUDIT_DIRECTORY]) {
          console.log(`    - ${AIR_DIRECTORY}/${dir}/`);
        }
        console.log(`  Configuration: ${ws.configService.getConfigPath()}`);
      } catch (error) {
        handleError(error);
      }
    });
}
