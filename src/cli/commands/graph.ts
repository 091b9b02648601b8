// Traceability commands: trace, graph

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { GRAPH_FORMATS, GraphFormat } from '../../services/graph/graph-service.js';
import { validateArtifactType } from '../../core/validation.js';
import { ValidationError } from '../../core/errors.js';
import { loadWorkspace, BaseOptions } from '../utils/context.js';
import { handleError, success } from '../utils/error-handler.js';
import { formatTrace, parseList } from '../utils/format.js';

interface TraceOptions extends BaseOptions {
  json?: boolean;
}

interface GraphCommandOptions extends BaseOptions {
  format: string;
  root?: string;
  types?: string;
  output?: string;
}

function isValidFormat(format: string): format is GraphFormat {
  const formats: readonly string[] = GRAPH_FORMATS;
  return formats.includes(format);
}

export function registerGraphCommands(program: Command): void {
  program
    .command('trace <id>')
    .description('Show what an artifact derives from and everything derived from it')
    .option('--json', 'Output as JSON')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (id: string, options: TraceOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const artifact = await ws.artifacts.get(id);
        const trace = await ws.graph.trace(artifact.id);

        if (options.json) {
          console.log(JSON.stringify(trace, null, 2));
          return;
        }
        formatTrace(artifact, trace).forEach(line => console.log(line));
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('graph')
    .description('Generate a lineage graph of artifacts')
    .option('-f, --format <format>', `Output format (${GRAPH_FORMATS.join(', ')})`, 'mermaid')
    .option('-r, --root <artifact-id>', 'Show only artifacts connected to the specified root')
    .option('--types <types>', 'Comma-separated artifact types to include')
    .option('-o, --output <file>', 'Write output to file instead of stdout')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (options: GraphCommandOptions) => {
      try {
        const format = options.format.trim().toLowerCase();
        if (!isValidFormat(format)) {
          throw new ValidationError(
            `Invalid format '${options.format}'. Valid formats: ${GRAPH_FORMATS.join(', ')}`,
            'format'
          );
        }

        const ws = await loadWorkspace(options.path);
        const root = options.root !== undefined ? (await ws.artifacts.get(options.root)).id : undefined;
        const includeTypes = options.types !== undefined
          ? parseList(options.types).map(validateArtifactType)
          : undefined;

        const graphOutput = await ws.graph.generateGraph({ format, rootId: root, includeTypes });

        if (options.output) {
          writeFileSync(options.output, graphOutput, 'utf-8');
          success(`Graph written to ${options.output}`);
          console.log(`  Format: ${format}`);
          if (root) {
            console.log(`  Root: ${root}`);
          }
        } else {
          console.log(graphOutput);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
