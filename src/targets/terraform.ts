import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { TerraformError } from '../errors.js';
import { debugLog } from '../log.js';
import { parseJson } from '../result/shape.js';

const execFileAsync = promisify(execFile);

export const TERRAFORM_COMMANDS = ['init', 'plan', 'apply', 'destroy', 'output'] as const;
export type TerraformCommand = (typeof TERRAFORM_COMMANDS)[number];

export type TerraformVars = Record<string, unknown>;

export interface TerraformOptions {
  workingDir: string;
  vars?: TerraformVars;
  /** Path or name of the terraform binary. */
  binary?: string;
  extraArgs?: string[];
}

export interface TerraformRun {
  command: TerraformCommand;
  args: string[];
  stdout: string;
  stderr: string;
  /** Parsed `output -json` result; absent for other commands. */
  outputs?: unknown;
}

export function parseTerraformCommand(value: string): TerraformCommand {
  const found = TERRAFORM_COMMANDS.find((c) => c === value);
  if (found === undefined) {
    throw new Error(`Unsupported terraform command '${value}' (expected one of: ${TERRAFORM_COMMANDS.join(', ')})`);
  }
  return found;
}

/**
 * Turn a JSON object into `-var key=value` pairs.
 *
 * Strings pass through as-is; numbers, booleans, lists and maps are
 * JSON-encoded, which terraform accepts as HCL literals. `null` and
 * `undefined` entries are skipped.
 */
export function buildVarArgs(vars: TerraformVars): string[] {
  const args: string[] = [];
  for (const [key, value] of Object.entries(vars)) {
    if (value === null || value === undefined) continue;
    if (!/^[A-Za-z_][A-Za-z0-9_-]*$/.test(key)) {
      throw new Error(`Invalid terraform variable name '${key}'`);
    }
    const rendered = typeof value === 'string' ? value : JSON.stringify(value);
    args.push('-var', `${key}=${rendered}`);
  }
  return args;
}

/** Parse a JSON object of terraform variables. */
export function parseVars(json: string): TerraformVars {
  const parsed = parseJson(json);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Terraform variables must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function terraformArgs(command: TerraformCommand, options: TerraformOptions): string[] {
  // output takes no -input, -no-color or -var
  if (command === 'output') {
    return ['output', '-json', ...(options.extraArgs ?? [])];
  }

  const args: string[] = [command, '-input=false', '-no-color'];
  switch (command) {
    case 'apply':
    case 'destroy':
      args.push('-auto-approve', ...buildVarArgs(options.vars ?? {}));
      break;
    case 'plan':
      args.push(...buildVarArgs(options.vars ?? {}));
      break;
    case 'init':
      break;
  }
  args.push(...(options.extraArgs ?? []));
  return args;
}

function execFailure(e: unknown): { code: number | null; stderr: string } | null {
  if (!(e instanceof Error) || !('code' in e)) return null;
  const code = typeof e.code === 'number' ? e.code : null;
  const stderr = 'stderr' in e && typeof e.stderr === 'string' ? e.stderr : '';
  return code === null && stderr === '' ? null : { code, stderr };
}

/**
 * Run one terraform command in `workingDir`.
 *
 * @throws TerraformError on a non-zero exit.
 */
export async function runTerraform(command: TerraformCommand, options: TerraformOptions): Promise<TerraformRun> {
  const binary = options.binary ?? 'terraform';
  const args = terraformArgs(command, options);
  debugLog('terraform', 'run', { binary, command, cwd: options.workingDir });

  let stdout: string;
  let stderr: string;
  try {
    ({ stdout, stderr } = await execFileAsync(binary, args, {
      cwd: options.workingDir,
      encoding: 'utf8',
      maxBuffer: 64 * 1024 * 1024,
      env: { ...process.env, TF_IN_AUTOMATION: '1' },
    }));
  } catch (e: unknown) {
    const failure = execFailure(e);
    if (failure === null) throw e;
    throw new TerraformError(command, failure.code, failure.stderr);
  }

  const run: TerraformRun = { command, args, stdout, stderr };
  if (command === 'output') {
    run.outputs = parseJson(stdout);
  }
  return run;
}
