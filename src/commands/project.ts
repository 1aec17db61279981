import path from 'path';
import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { formatPathForDisplay, renderGraph } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import { type LoadCommandOptions, prepareCommand } from './shared.js';

async function projectCommand(projectDir: string | undefined, options: LoadCommandOptions, command: Command): Promise<void> {
  const { cwd, format, loader } = await prepareCommand(options, command);
  const projectPath = path.resolve(cwd, projectDir ?? '.');

  logger.info(`Resolving project at ${formatPathForDisplay(projectPath, cwd)}`);
  const project = await loader.loadProject(projectPath);

  process.stdout.write(renderGraph(project, format));
}

export function setupProjectCommand(program: Command): void {
  program
    .command('project')
    .description('Resolve a project manifest and print its graph')
    .argument('[path]', 'directory containing Project.yml (defaults to the working directory)')
    .option('-f, --format <format>', 'output format: json or yaml')
    .action(withErrorHandling(async (projectDir: string | undefined, options: LoadCommandOptions, command: Command) => {
      await projectCommand(projectDir, options, command);
    }));
}
