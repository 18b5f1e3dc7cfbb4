/**
 * `init` command: writes a starter configuration file.
 */

import chalk from 'chalk';
import * as path from 'node:path';
import * as fs from 'node:fs';

import { CONFIG_FILE_NAME, starterConfig } from '../core/config';

/** Returns false when a configuration file already exists. */
export function executeInitCommand(projectPath: string): boolean {
  const absolutePath = path.resolve(projectPath);
  const configPath = path.join(absolutePath, CONFIG_FILE_NAME);

  if (fs.existsSync(configPath)) {
    console.log(
      chalk.yellow(`⚠  Config file already exists: ${configPath}\nRemove it first if you want to re-initialize.`)
    );
    process.exitCode = 1;
    return false;
  }

  if (!fs.existsSync(absolutePath)) {
    fs.mkdirSync(absolutePath, { recursive: true });
  }

  fs.writeFileSync(configPath, JSON.stringify(starterConfig(), null, 2) + '\n', 'utf-8');

  console.log(chalk.green(`✔ Created ${configPath}`));
  return true;
}
