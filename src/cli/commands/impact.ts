// Impact analysis command for the AirSDLC tracker CLI

import { Command } from 'commander';
import { loadWorkspace, BaseOptions } from '../utils/context.js';
import { handleError } from '../utils/error-handler.js';
import { formatImpact } from '../utils/format.js';

interface ImpactOptions extends BaseOptions {
  json?: boolean;
}

/**
 * Registers `air impact <id>`: dependents, risk score and the follow-up
 * checklist for changing or retiring an artifact
 */
export function registerImpactCommand(program: Command): void {
  program
    .command('impact <artifact-id>')
    .description('Analyze the impact of changing or retiring an artifact')
    .option('--json', 'Output results as JSON')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (artifactId: string, options: ImpactOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const artifact = await ws.artifacts.get(artifactId);
        const report = await ws.impact.analyzeImpact(artifact.id);
        const checklist = await ws.impact.generateChecklist(artifact.id);

        if (options.json) {
          console.log(JSON.stringify({ ...report, tasks: checklist.tasks }, null, 2));
          return;
        }
        console.log(`${artifact.id} - ${artifact.title}\n`);
        formatImpact(report, checklist).forEach(line => console.log(line));
      } catch (error) {
        handleError(error);
      }
    });
}
