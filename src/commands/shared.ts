import path from 'path';
import { Command } from 'commander';
import type { OutputFormat } from '../types/index.js';
import { loadConfig, isOutputFormat } from '../core/config.js';
import { GeneratorModelLoader } from '../core/resolution/model-loader.js';
import { ManifestTargetGenerator } from '../core/resolution/manifest-target-generator.js';
import { consoleDiagnostics } from '../core/ports/index.js';
import { ConfigError } from '../utils/errors.js';

export interface LoadCommandOptions {
  format?: string;
}

export interface CommandSetup {
  cwd: string;
  format: OutputFormat;
  loader: GeneratorModelLoader;
}

/**
 * Resolve the working directory, configuration and loader shared by the
 * project and workspace commands.
 */
export async function prepareCommand(options: LoadCommandOptions, command: Command): Promise<CommandSetup> {
  const globalOptions = command.optsWithGlobals();
  const cwd = typeof globalOptions.cwd === 'string'
    ? path.resolve(process.cwd(), globalOptions.cwd)
    : process.cwd();

  const config = await loadConfig(cwd);

  let format = config.format;
  if (options.format !== undefined) {
    if (!isOutputFormat(options.format)) {
      throw new ConfigError(`Unknown output format '${options.format}' (expected json or yaml)`);
    }
    format = options.format;
  }

  const loader = new GeneratorModelLoader({
    manifestTargetGenerator: new ManifestTargetGenerator(config),
    diagnostics: consoleDiagnostics,
  });

  return { cwd, format, loader };
}
