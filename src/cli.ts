#!/usr/bin/env node
import fs from 'fs';
import { Command, Option } from 'commander';
import { adapters } from './adapters';
import { AgentRegistryClient, ClientOptions } from './client';
import { SDK_VERSION } from './config/api';
import { normalizeAgentData } from './services/detector';
import { FRAMEWORK_TAGS, FrameworkTag, isFrameworkTag } from './types/agent';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export type CliClient = Pick<AgentRegistryClient, 'register' | 'verify' | 'health'>;

export interface CliDeps {
  createClient: (options: ClientOptions) => CliClient;
  io: CliIO;
}

interface ConnectionOptions {
  email?: string;
  apiKey?: string;
  password?: string;
  baseUrl?: string;
}

interface RegisterCommandOptions extends ConnectionOptions {
  owner?: string;
  framework?: string;
  output?: string;
}

interface NormalizeCommandOptions {
  framework?: string;
}

const defaultDeps: CliDeps = {
  createClient: (options) => new AgentRegistryClient(options),
  io: {
    out: (line) => console.log(line),
    err: (line) => console.error(line)
  }
};

function frameworkOption() {
  return new Option('-f, --framework <tag>', 'skip detection and use this framework adapter').choices(FRAMEWORK_TAGS);
}

function asFramework(value: string | undefined): FrameworkTag | undefined {
  return isFrameworkTag(value) ? value : undefined;
}

// by shape: errors raised in another realm fail `instanceof Error`
function errorMessage(err: unknown) {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

async function readAgentFile(file: string): Promise<string> {
  return fs.promises.readFile(file, 'utf8');
}

export function buildProgram(deps: CliDeps = defaultDeps): Command {
  const { io } = deps;
  const program = new Command();

  async function guarded(action: () => Promise<void>) {
    try {
      await action();
    } catch (err) {
      io.err(`❌ ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  }

  program
    .name('agentreg')
    .description('Normalize, score and register AI agent definitions')
    .version(SDK_VERSION);

  program
    .command('normalize <file>')
    .description('Print the canonical record for an agent definition (no network)')
    .addOption(frameworkOption())
    .action(async (file: string, options: NormalizeCommandOptions) => {
      await guarded(async () => {
        const record = normalizeAgentData(await readAgentFile(file), { framework: asFramework(options.framework) });
        io.out(JSON.stringify(record, null, 2));
      });
    });

  program
    .command('register <file>')
    .description('Register the agent described by a JSON or YAML file')
    .option('-e, --email <email>', 'account email')
    .option('-k, --api-key <key>', 'API key')
    .option('-p, --password <password>', 'account password, exchanged for a token')
    .option('--owner <owner>', 'owner recorded for the agent')
    .option('--base-url <url>', 'registry API base URL')
    .option('-o, --output <file>', 'save the registration result as JSON')
    .addOption(frameworkOption())
    .action(async (file: string, options: RegisterCommandOptions) => {
      await guarded(async () => {
        const client = deps.createClient({
          email: options.email,
          apiKey: options.apiKey,
          password: options.password,
          baseUrl: options.baseUrl
        });
        const result = await client.register(await readAgentFile(file), {
          owner: options.owner,
          framework: asFramework(options.framework)
        });
        io.out('✅ Agent registered');
        io.out(`   Agent ID:    ${result.agentId}`);
        io.out(`   Status:      ${result.status}`);
        io.out(`   Trust Score: ${result.trustScore}`);
        if (options.output) {
          await fs.promises.writeFile(options.output, `${JSON.stringify(result, null, 2)}\n`, 'utf8');
          io.out(`   Saved to:    ${options.output}`);
        }
      });
    });

  program
    .command('verify <agentId>')
    .description('Look up the registration status of an agent')
    .option('--base-url <url>', 'registry API base URL')
    .action(async (agentId: string, options: ConnectionOptions) => {
      await guarded(async () => {
        const result = await deps.createClient({ baseUrl: options.baseUrl }).verify(agentId);
        io.out(JSON.stringify(result, null, 2));
      });
    });

  program
    .command('health')
    .description('Check that the registry API is reachable')
    .option('--base-url <url>', 'registry API base URL')
    .action(async (options: ConnectionOptions) => {
      await guarded(async () => {
        const result = await deps.createClient({ baseUrl: options.baseUrl }).health();
        io.out(`✅ Registry reachable (status: ${result.status})`);
      });
    });

  program
    .command('frameworks')
    .description('List supported agent frameworks')
    .action(() => {
      for (const tag of FRAMEWORK_TAGS) io.out(`${tag.padEnd(20)}${adapters[tag].label}`);
    });

  return program;
}

export async function main(argv: string[] = process.argv, deps: CliDeps = defaultDeps) {
  await buildProgram(deps).parseAsync(argv);
}

if (require.main === module) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
