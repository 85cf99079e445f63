// packages/cli/src/commands/doctor.ts — Preflight diagnostics

import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { CONFIG_FILENAME, VERSION, errorMessage, loadConfig } from '@docsift/core';
import chalk from 'chalk';

export interface Check {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

async function checkOptionalPackage(
  name: string,
  purpose: string,
  load: () => Promise<unknown>,
): Promise<Check> {
  try {
    await load();
    return { name, status: 'pass', message: `${name} available (${purpose})` };
  } catch (error) {
    return {
      name,
      status: 'warn',
      message: `${name} could not be loaded: ${errorMessage(error)}`,
      fix: `npm install ${name}`,
    };
  }
}

export async function runChecks(cwd: string, env: NodeJS.ProcessEnv): Promise<Check[]> {
  const checks: Check[] = [];

  // 1. Config file (optional, but must be valid when present)
  let apiKeyEnv = 'GEMINI_API_KEY';
  try {
    const config = loadConfig({ projectDir: cwd });
    apiKeyEnv = config.model.apiKeyEnv;
    if (existsSync(join(cwd, CONFIG_FILENAME))) {
      checks.push({ name: 'config', status: 'pass', message: `${CONFIG_FILENAME} found and valid` });
    } else {
      checks.push({
        name: 'config',
        status: 'warn',
        message: `${CONFIG_FILENAME} not found, using defaults`,
        fix: 'docsift init',
      });
    }
  } catch (error) {
    checks.push({ name: 'config', status: 'fail', message: errorMessage(error), fix: `Edit ${CONFIG_FILENAME}` });
  }

  // 2. API key
  if (env[apiKeyEnv]?.trim()) {
    checks.push({ name: 'api-key', status: 'pass', message: `${apiKeyEnv} is set` });
  } else {
    checks.push({
      name: 'api-key',
      status: 'fail',
      message: `${apiKeyEnv} is not set`,
      fix: `export ${apiKeyEnv}=<your key>`,
    });
  }

  // 3. Format libraries
  checks.push(await checkOptionalPackage('mammoth', '.docx support', () => import('mammoth')));
  checks.push(await checkOptionalPackage('xlsx', '.xlsx/.xls support', () => import('xlsx')));

  // 4. Node version
  const nodeVersion = process.version;
  const major = Number.parseInt(nodeVersion.slice(1).split('.')[0], 10);
  if (major >= 20) {
    checks.push({ name: 'node', status: 'pass', message: `Node.js ${nodeVersion}` });
  } else {
    checks.push({
      name: 'node',
      status: 'fail',
      message: `Node.js ${nodeVersion} (requires >= 20)`,
      fix: 'Install Node.js 20+',
    });
  }

  return checks;
}

export async function doctorCommand(): Promise<void> {
  console.error(chalk.cyan(`\n  docsift doctor v${VERSION}\n`));

  const checks = await runChecks(process.cwd(), process.env);

  let hasFailure = false;
  for (const check of checks) {
    const icon =
      check.status === 'pass'
        ? chalk.green('PASS')
        : check.status === 'warn'
          ? chalk.yellow('WARN')
          : chalk.red('FAIL');
    console.error(`  ${icon} ${check.name}: ${check.message}`);
    if (check.fix) {
      console.error(chalk.dim(`       → ${check.fix}`));
    }
    if (check.status === 'fail') hasFailure = true;
  }

  console.error('');
  console.log(JSON.stringify({ version: VERSION, checks, healthy: !hasFailure }, null, 2));

  if (hasFailure) {
    process.exit(1);
  }
}
