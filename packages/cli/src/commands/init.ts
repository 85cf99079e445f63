import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { CONFIG_FILENAME, DEFAULT_CONFIG, writeConfig } from '@docsift/core';
import chalk from 'chalk';

interface InitOptions {
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const cwd = process.cwd();

  if (existsSync(join(cwd, CONFIG_FILENAME)) && !options.force) {
    console.error(chalk.red(`${CONFIG_FILENAME} already exists. Use --force to overwrite.`));
    process.exit(1);
  }

  const configPath = writeConfig(DEFAULT_CONFIG, cwd);
  console.log(chalk.green(`Created ${configPath}`));
  console.log(chalk.gray(`  model: ${DEFAULT_CONFIG.model.name}`));
  console.log(chalk.gray(`\nNext: export ${DEFAULT_CONFIG.model.apiKeyEnv}=... and run docsift analyze <file>`));
}
