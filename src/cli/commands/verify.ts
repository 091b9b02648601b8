// Verify command: check every artifact and pattern against the store invariants

import { Command } from 'commander';
import { loadWorkspace, BaseOptions } from '../utils/context.js';
import { handleError, success } from '../utils/error-handler.js';
import { formatVerifyReport } from '../utils/format.js';

interface VerifyOptions extends BaseOptions {
  json?: boolean;
  strict?: boolean;
}

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Check seals, links, lineage and file integrity across the store')
    .option('--json', 'Output the report as JSON')
    .option('--strict', 'Fail on warnings as well as errors')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (options: VerifyOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const report = await ws.verify.verify();

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
        } else if (report.issues.length === 0) {
          success(`Checked ${report.checked} file(s): no issues`);
        } else {
          formatVerifyReport(report).forEach(line => console.log(line));
        }

        if (!report.ok || (options.strict && report.warnings > 0)) {
          process.exitCode = 1;
        }
      } catch (error) {
        handleError(error);
      }
    });
}
