import path from 'path';
import { Command } from 'commander';
import type { Project } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatPathForDisplay, renderGraph } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import { type LoadCommandOptions, prepareCommand } from './shared.js';

interface WorkspaceOptions extends LoadCommandOptions {
  projects?: boolean;
}

async function workspaceCommand(workspaceDir: string | undefined, options: WorkspaceOptions, command: Command): Promise<void> {
  const { cwd, format, loader } = await prepareCommand(options, command);
  const workspacePath = path.resolve(cwd, workspaceDir ?? '.');

  logger.info(`Resolving workspace at ${formatPathForDisplay(workspacePath, cwd)}`);
  const workspace = await loader.loadWorkspace(workspacePath);

  if (!options.projects) {
    process.stdout.write(renderGraph(workspace, format));
    return;
  }

  // Members are loaded one by one as whole projects, each with its manifest target
  const projects: Project[] = [];
  for (const projectPath of workspace.projects) {
    projects.push(await loader.loadProject(projectPath));
  }
  process.stdout.write(renderGraph({ ...workspace, projects }, format));
}

export function setupWorkspaceCommand(program: Command): void {
  program
    .command('workspace')
    .description('Resolve a workspace manifest and print its graph')
    .argument('[path]', 'directory containing Workspace.yml (defaults to the working directory)')
    .option('-f, --format <format>', 'output format: json or yaml')
    .option('-p, --projects', 'also resolve every member project')
    .action(withErrorHandling(async (workspaceDir: string | undefined, options: WorkspaceOptions, command: Command) => {
      await workspaceCommand(workspaceDir, options, command);
    }));
}
