#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { setupProjectCommand } from './commands/project.js';
import { setupWorkspaceCommand } from './commands/workspace.js';

/**
 * xcgraph CLI - Main entry point
 *
 * Resolves Project.yml / Workspace.yml manifests into the project graph
 * consumed by the project-file generator.
 */

const program = new Command();

program
  .name('xcgraph')
  .description('Resolve workspace and project manifests into a project graph')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .configureHelp({ sortSubcommands: true });

setupProjectCommand(program);
setupWorkspaceCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts();

  if (typeof opts.cwd === 'string') {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      logger.info(`Working directory will be: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`Invalid --cwd '${opts.cwd}': Directory must exist. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with XCGRAPH_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

/**
 * True when this module is the process entry, either directly or through
 * the symlink npm installs for the `xcgraph` bin.
 */
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
