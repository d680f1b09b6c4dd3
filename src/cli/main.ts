#!/usr/bin/env node
import { Command, Option } from 'commander';

// App layer
import { loadConfig, configOutput } from '../app/config.js';
import { type AppEnv, createAppEnv } from '../app/env.js';
import type { ConnectionOptions, VCloudConnectionOptions } from '../app/connect.js';
import { exportCredential, showCredential } from '../app/credentials.js';
import type { RequestCommandOptions } from '../app/request.js';
import { vcenterRequest, vcenterVm, vcenterVms } from '../app/vcenter.js';
import { nsxRequest, nsxSegment, nsxSegments } from '../app/nsx.js';
import { parsePowerAction, vcloudPower, vcloudRequest, vcloudTask, vcloudVms } from '../app/vcloud.js';
import { terraformCommand } from '../app/terraform.js';

// Library
import { parseDuration } from '../duration.js';
import { errorMessage } from '../errors.js';
import { debugLog } from '../log.js';
import { TERRAFORM_COMMANDS } from '../targets/terraform.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type GlobalCliOptions = {
  config?: string;
  skipCertificateCheck?: boolean;
  timeout?: string;
  interactive: boolean;
};

async function run(fn: () => Promise<unknown>, output: { raw?: boolean } = {}): Promise<void> {
  try {
    const result = await fn();
    if (output.raw && typeof result === 'string') {
      process.stdout.write(result.endsWith('\n') ? result : `${result}\n`);
    } else {
      console.log(JSON.stringify(result ?? null, null, 2));
    }
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
}

async function runWithEnv(fn: (env: AppEnv) => Promise<unknown>, output: { raw?: boolean } = {}): Promise<void> {
  await run(async () => {
    const opts = program.opts<GlobalCliOptions>();
    const loaded = await loadConfig(opts.config);
    const env = createAppEnv(loaded.config, {
      skipCertificateCheck: opts.skipCertificateCheck,
      timeoutMs: opts.timeout === undefined ? undefined : parseDuration(opts.timeout),
      // --no-interactive forces prompts off; otherwise prompt only on a terminal.
      interactive: opts.interactive ? undefined : false,
    });
    try {
      return await fn(env);
    } finally {
      debugLog('session', 'session entries at exit', { keys: Object.keys(env.context.snapshot()) });
    }
  }, output);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withConnectionOptions(cmd: Command): Command {
  return cmd
    .option('--server <server>', 'server name or URL (defaults to config)')
    .option('--username <username>', 'username (defaults to config)')
    .option('--password <password>', 'password, plain or encoded with the secret key');
}

function withVCloudOptions(cmd: Command): Command {
  return withConnectionOptions(cmd)
    .option('--org <org>', 'organization to log in to (defaults to config)')
    .option('--api-version <version>', 'API version sent in the Accept header');
}

function withRequestOptions(cmd: Command): Command {
  return cmd
    .option('--method <method>', 'HTTP method', 'GET')
    .option('--body <body>', 'request body')
    .option('--header <name:value>', 'extra header (repeatable)', collect, [] as string[])
    .option('--raw', 'print the response body unchanged')
    .addOption(new Option('--format <format>', 'how to parse the response').choices(['auto', 'json', 'xml']).default('auto'));
}

function connectionOf(opts: ConnectionOptions): ConnectionOptions {
  return { server: opts.server, username: opts.username, password: opts.password };
}

function vcloudConnectionOf(opts: VCloudConnectionOptions): VCloudConnectionOptions {
  return { ...connectionOf(opts), org: opts.org, apiVersion: opts.apiVersion };
}

type RequestCliOptions = ConnectionOptions & RequestCommandOptions;
type VCloudRequestCliOptions = VCloudConnectionOptions & RequestCommandOptions;

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('vmkit')
  .description('Query and drive vCenter, NSX Manager, vCloud Director and Terraform')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config file')
  .option('--skip-certificate-check', 'accept any server certificate')
  .option('--timeout <duration>', 'per-request timeout, e.g. "30s"')
  .option('--no-interactive', 'never prompt for credentials');

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

program
  .command('config')
  .description('Print configuration as JSON')
  .action(async () => {
    await run(async () => configOutput(await loadConfig(program.opts<GlobalCliOptions>().config)));
  });

// ---------------------------------------------------------------------------
// credential
// ---------------------------------------------------------------------------

const credential = program.command('credential').description('Manage stored credentials');

credential
  .command('export')
  .description('Save a credential for a server (prompts for what is missing)')
  .requiredOption('--server <server>', 'server name or URL')
  .option('--username <username>', 'username')
  .option('--password <password>', 'password to store')
  .action(async (opts: { server: string; username?: string; password?: string }) => {
    await runWithEnv((env) => exportCredential(env, opts));
  });

credential
  .command('show')
  .description('Show which stored credential a server connection would use')
  .requiredOption('--server <server>', 'server name or URL')
  .option('--username <username>', 'username')
  .action(async (opts: { server: string; username?: string }) => {
    await runWithEnv((env) => showCredential(env, opts));
  });

// ---------------------------------------------------------------------------
// vcenter
// ---------------------------------------------------------------------------

const vcenter = program.command('vcenter').description('vCenter Server (vSphere Automation API)');

withConnectionOptions(vcenter.command('vms'))
  .description('List virtual machines')
  .option('--name <name>', 'only VMs with this name (repeatable)', collect, [] as string[])
  .option('--power-state <state>', 'only VMs in this power state (repeatable)', collect, [] as string[])
  .action(async (opts: ConnectionOptions & { name: string[]; powerState: string[] }) => {
    await runWithEnv((env) =>
      vcenterVms(env, connectionOf(opts), { names: opts.name, powerStates: opts.powerState }),
    );
  });

withConnectionOptions(vcenter.command('vm <id>'))
  .description('Show one virtual machine')
  .action(async (id: string, opts: ConnectionOptions) => {
    await runWithEnv((env) => vcenterVm(env, connectionOf(opts), id));
  });

withRequestOptions(withConnectionOptions(vcenter.command('request <endpoint>')))
  .description('Call an arbitrary API endpoint')
  .action(async (endpoint: string, opts: RequestCliOptions) => {
    await runWithEnv((env) => vcenterRequest(env, connectionOf(opts), endpoint, opts), { raw: opts.raw });
  });

// ---------------------------------------------------------------------------
// nsx
// ---------------------------------------------------------------------------

const nsx = program.command('nsx').description('NSX Manager (Policy API)');

withConnectionOptions(nsx.command('segments'))
  .description('List segments')
  .action(async (opts: ConnectionOptions) => {
    await runWithEnv((env) => nsxSegments(env, connectionOf(opts)));
  });

withConnectionOptions(nsx.command('segment <id>'))
  .description('Show one segment')
  .action(async (id: string, opts: ConnectionOptions) => {
    await runWithEnv((env) => nsxSegment(env, connectionOf(opts), id));
  });

withRequestOptions(withConnectionOptions(nsx.command('request <endpoint>')))
  .description('Call an arbitrary API endpoint')
  .action(async (endpoint: string, opts: RequestCliOptions) => {
    await runWithEnv((env) => nsxRequest(env, connectionOf(opts), endpoint, opts), { raw: opts.raw });
  });

// ---------------------------------------------------------------------------
// vcloud
// ---------------------------------------------------------------------------

const vcloud = program.command('vcloud').description('vCloud Director (XML API)');

withVCloudOptions(vcloud.command('vms'))
  .description('List virtual machines visible to the user')
  .action(async (opts: VCloudConnectionOptions) => {
    await runWithEnv((env) => vcloudVms(env, vcloudConnectionOf(opts)));
  });

withVCloudOptions(vcloud.command('task <href>'))
  .description('Show a task by href or id')
  .option('--wait', 'poll until the task finishes')
  .action(async (href: string, opts: VCloudConnectionOptions & { wait?: boolean }) => {
    await runWithEnv((env) => vcloudTask(env, vcloudConnectionOf(opts), href, { wait: opts.wait }));
  });

withVCloudOptions(vcloud.command('power <href> <action>'))
  .description('Run a power action (powerOn, powerOff, reset, suspend, shutdown) on a VM or vApp')
  .option('--wait', 'poll until the spawned task finishes')
  .action(async (href: string, action: string, opts: VCloudConnectionOptions & { wait?: boolean }) => {
    await runWithEnv((env) =>
      vcloudPower(env, vcloudConnectionOf(opts), href, parsePowerAction(action), { wait: opts.wait }),
    );
  });

withRequestOptions(withVCloudOptions(vcloud.command('request <endpoint>')))
  .description('Call an arbitrary API endpoint')
  .action(async (endpoint: string, opts: VCloudRequestCliOptions) => {
    await runWithEnv((env) => vcloudRequest(env, vcloudConnectionOf(opts), endpoint, opts), { raw: opts.raw });
  });

// ---------------------------------------------------------------------------
// terraform
// ---------------------------------------------------------------------------

program
  .command('terraform <command>')
  .description(`Run terraform (${TERRAFORM_COMMANDS.join(', ')})`)
  .option('--dir <path>', 'working directory (defaults to config, then the current directory)')
  .option('--vars <json>', 'variables as a JSON object')
  .option('--vars-file <path>', 'file holding variables as a JSON object')
  .option('--arg <arg>', 'extra argument passed to terraform (repeatable)', collect, [] as string[])
  .action(async (command: string, opts: { dir?: string; vars?: string; varsFile?: string; arg: string[] }) => {
    await run(async () => {
      const loaded = await loadConfig(program.opts<GlobalCliOptions>().config);
      return terraformCommand(loaded.config, command, {
        dir: opts.dir,
        vars: opts.vars,
        varsFile: opts.varsFile,
        extraArgs: opts.arg,
      });
    });
  });

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

await program.parseAsync(process.argv);
