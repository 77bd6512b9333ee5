import fs from 'fs';
import os from 'os';
import path from 'path';
import { buildProgram, CliDeps } from '../src/cli';
import { AgentRegistryClient } from '../src/client';
import { ValidationError } from '../src/lib/errors';
import { normalizeAgentData } from '../src/services/detector';
import { HealthStatus, RegistrationResult, VerificationResult } from '../src/validators/registryResponseSchema';
import { researcherCrewMember } from './helpers/records';

const CREW_YAML = 'role: Researcher\ngoal: find facts\ntools:\n  - search\nmemory: true\n';

function harness() {
  const out: string[] = [];
  const err: string[] = [];
  const client = {
    register: jest.fn<Promise<RegistrationResult>, Parameters<AgentRegistryClient['register']>>(),
    verify: jest.fn<Promise<VerificationResult>, [string]>(),
    health: jest.fn<Promise<HealthStatus>, []>()
  };
  const createClient = jest.fn<typeof client, Parameters<CliDeps['createClient']>>(() => client);
  const deps: CliDeps = { createClient, io: { out: (line) => out.push(line), err: (line) => err.push(line) } };
  const run = (...args: string[]) => buildProgram(deps).parseAsync(args, { from: 'user' });
  return { out, err, client, createClient, run };
}

describe('agentreg cli', () => {
  let dir: string;
  let agentFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'agentreg-cli-'));
    agentFile = path.join(dir, 'agent.yaml');
    fs.writeFileSync(agentFile, CREW_YAML, 'utf8');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('prints the canonical record for a file', async () => {
    const { out, createClient, run } = harness();

    await run('normalize', agentFile);

    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0])).toEqual(normalizeAgentData(researcherCrewMember));
    expect(createClient).not.toHaveBeenCalled();
  });

  it('normalizes with a forced framework', async () => {
    const { out, run } = harness();

    await run('normalize', agentFile, '--framework', 'langchain');

    expect(JSON.parse(out[0])).toMatchObject({ agentType: 'langchain', name: 'Unnamed LangChain Agent' });
  });

  it('registers a file and saves the result', async () => {
    const { out, client, createClient, run } = harness();
    const result = { agentId: 'agt-1', status: 'pending', trustScore: 96 };
    client.register.mockResolvedValueOnce(result);
    const outputFile = path.join(dir, 'result.json');

    await run(
      'register',
      agentFile,
      '-e',
      'dev@example.com',
      '-k',
      'test-key',
      '--base-url',
      'https://registry.test/api',
      '-f',
      'crewai',
      '-o',
      outputFile
    );

    expect(createClient).toHaveBeenCalledWith({
      email: 'dev@example.com',
      apiKey: 'test-key',
      password: undefined,
      baseUrl: 'https://registry.test/api'
    });
    expect(client.register).toHaveBeenCalledWith(CREW_YAML, { owner: undefined, framework: 'crewai' });
    expect(out).toEqual([
      '✅ Agent registered',
      '   Agent ID:    agt-1',
      '   Status:      pending',
      '   Trust Score: 96',
      `   Saved to:    ${outputFile}`
    ]);
    expect(fs.readFileSync(outputFile, 'utf8')).toBe(`${JSON.stringify(result, null, 2)}\n`);
    expect(process.exitCode).toBeUndefined();
  });

  it('passes the owner override to the client', async () => {
    const { client, run } = harness();
    client.register.mockResolvedValueOnce({ agentId: 'agt-1', status: 'pending', trustScore: 96 });

    await run('register', agentFile, '--owner', 'Data Team');

    expect(client.register).toHaveBeenCalledWith(CREW_YAML, { owner: 'Data Team', framework: undefined });
  });

  it('prints SDK errors and sets a failing exit code', async () => {
    const { out, err, client, run } = harness();
    client.register.mockRejectedValueOnce(new ValidationError('invalid credentials: email is required'));

    await run('register', agentFile);

    expect(out).toEqual([]);
    expect(err).toEqual(['❌ invalid credentials: email is required']);
    expect(process.exitCode).toBe(1);
  });

  it('reports a missing agent file', async () => {
    const { err, client, run } = harness();
    const missing = path.join(dir, 'missing.yaml');

    await run('register', missing);

    expect(err).toEqual([`❌ ENOENT: no such file or directory, open '${missing}'`]);
    expect(client.register).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it('prints the verification result', async () => {
    const { out, client, createClient, run } = harness();
    client.verify.mockResolvedValueOnce({ agentId: 'agt-1', status: 'verified', verified: true });

    await run('verify', 'agt-1', '--base-url', 'https://registry.test/api');

    expect(createClient).toHaveBeenCalledWith({ baseUrl: 'https://registry.test/api' });
    expect(client.verify).toHaveBeenCalledWith('agt-1');
    expect(out).toEqual([JSON.stringify({ agentId: 'agt-1', status: 'verified', verified: true }, null, 2)]);
  });

  it('reports registry health', async () => {
    const { out, client, run } = harness();
    client.health.mockResolvedValueOnce({ status: 'ok' });

    await run('health');

    expect(out).toEqual(['✅ Registry reachable (status: ok)']);
  });

  it('lists every supported framework', async () => {
    const { out, run } = harness();

    await run('frameworks');

    expect(out).toHaveLength(14);
    expect(out[0]).toBe(`${'crewai'.padEnd(20)}CrewAI`);
    expect(out[13]).toBe(`${'google-adk'.padEnd(20)}Google Agent Development Kit`);
  });
});
