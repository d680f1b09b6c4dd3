/**
 * `terraform` command: assemble variables and run one terraform command.
 */

import fs from 'node:fs';
import path from 'node:path';

import type { Config } from '../config.js';
import {
  type TerraformRun,
  type TerraformVars,
  parseTerraformCommand,
  parseVars,
  runTerraform,
} from '../targets/terraform.js';

export interface TerraformCommandOptions {
  /** Working directory; defaults to `[terraform].working_dir`, then the current directory. */
  dir?: string;
  /** JSON object of variables. */
  vars?: string;
  /** File holding a JSON object of variables. `vars` entries win on conflict. */
  varsFile?: string;
  /** Arguments passed through after the generated ones. */
  extraArgs?: string[];
}

export async function collectVars(options: TerraformCommandOptions): Promise<TerraformVars> {
  const vars: TerraformVars = {};
  if (options.varsFile !== undefined) {
    Object.assign(vars, parseVars(await fs.promises.readFile(options.varsFile, 'utf-8')));
  }
  if (options.vars !== undefined) {
    Object.assign(vars, parseVars(options.vars));
  }
  return vars;
}

export async function terraformCommand(
  config: Config,
  command: string,
  options: TerraformCommandOptions = {},
): Promise<TerraformRun> {
  const parsed = parseTerraformCommand(command);
  const workingDir = path.resolve(options.dir ?? config.terraform.working_dir ?? process.cwd());
  return runTerraform(parsed, {
    workingDir,
    vars: await collectVars(options),
    binary: config.terraform.binary,
    extraArgs: options.extraArgs,
  });
}
