import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { CommandModule } from 'yargs';
import { CONFIG_FILENAME, MAX_TAB_SIZE, writeProjectConfig } from '@bin2const/core';
import type { ProjectConfig } from '@bin2const/core';
import { projectDir } from '../args.ts';

export interface InitCommandOptions {
  project: string;
  force: boolean;
  tabSize?: number;
}

export function runInit(options: InitCommandOptions): void {
  const configPath = join(options.project, CONFIG_FILENAME);

  if (existsSync(configPath) && !options.force) {
    console.error(`${CONFIG_FILENAME} already exists. Use --force to overwrite.`);
    process.exitCode = 1;
    return;
  }

  const config: ProjectConfig = {};
  if (options.tabSize !== undefined) config.tabSize = options.tabSize;

  writeProjectConfig(options.project, config);
  console.log(`Created ${configPath}`);
  if (config.tabSize !== undefined) console.log(`  tabSize: ${config.tabSize}`);
}

export const initCommand: CommandModule = {
  command: 'init',
  describe: `Create a ${CONFIG_FILENAME} project config`,
  builder: (yargs) =>
    yargs
      .option('force', {
        alias: 'f',
        describe: 'Overwrite existing config',
        type: 'boolean',
        default: false,
      })
      .option('tab-size', {
        describe: 'Default indentation width',
        type: 'number',
      }),
  handler: (argv) => {
    const raw = argv['tabSize'];
    const tabSize = typeof raw === 'number' ? raw : undefined;
    if (raw !== undefined && (tabSize === undefined || !Number.isInteger(tabSize) || tabSize < 0 || tabSize > MAX_TAB_SIZE)) {
      console.error(`--tab-size must be an integer from 0 to ${MAX_TAB_SIZE}`);
      process.exitCode = 1;
      return;
    }
    runInit({
      project: projectDir(argv),
      force: argv['force'] === true,
      tabSize,
    });
  },
};
