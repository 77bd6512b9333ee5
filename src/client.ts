import { config } from './config';
import { ValidationError } from './lib/errors';
import { logger } from './lib/logger';
import { DEFAULT_OWNER } from './adapters/recordDraft';
import { normalizeAgentData, NormalizeOptions } from './services/detector';
import { checkHealth, login, registerAgent, RegistryAuth, verifyAgent } from './services/registryApi';
import { CanonicalAgentRecord } from './types/agent';
import { agentIdSchema, Credentials, credentialsSchema } from './validators/credentialsSchema';
import { HealthStatus, RegistrationResult, VerificationResult } from './validators/registryResponseSchema';

export interface ClientOptions {
  email?: string;
  apiKey?: string;
  password?: string;
  baseUrl?: string;
}

export interface RegisterOptions extends NormalizeOptions {
  /** Overrides any owner found in the agent description. */
  owner?: string;
}

/**
 * Owner sent with a registration: explicit override, then the owner the
 * description carried, then the local part of the account email.
 */
export function resolveOwner(record: CanonicalAgentRecord, email: string, override?: string): string {
  if (override && override.trim()) return override.trim();
  if (record.owner && record.owner !== DEFAULT_OWNER) return record.owner;
  return email.split('@')[0] || DEFAULT_OWNER;
}

export class AgentRegistryClient {
  private readonly options: Required<Pick<ClientOptions, 'baseUrl'>> & ClientOptions;

  constructor(options: ClientOptions = {}) {
    this.options = {
      email: options.email ?? config.email,
      apiKey: options.apiKey ?? config.apiKey,
      password: options.password ?? config.password,
      baseUrl: options.baseUrl ?? config.apiBaseUrl
    };
  }

  get baseUrl() {
    return this.options.baseUrl;
  }

  normalize(input: unknown, options: NormalizeOptions = {}): CanonicalAgentRecord {
    return normalizeAgentData(input, options);
  }

  async register(input: unknown, options: RegisterOptions = {}): Promise<RegistrationResult> {
    const credentials = this.credentials();
    const normalized = normalizeAgentData(input, { framework: options.framework });
    const agent = { ...normalized, owner: resolveOwner(normalized, credentials.email, options.owner) };
    const auth = await this.authenticate(credentials);
    logger.info({ agentType: agent.agentType, name: agent.name, trustScore: agent.trustScore }, 'registering agent');
    return registerAgent(this.options.baseUrl, { email: credentials.email, agent }, auth);
  }

  async verify(agentId: string): Promise<VerificationResult> {
    const parsed = agentIdSchema.safeParse(agentId);
    if (!parsed.success) {
      throw new ValidationError('invalid agent id', parsed.error.errors.map((e) => e.message));
    }
    return verifyAgent(this.options.baseUrl, parsed.data);
  }

  async health(): Promise<HealthStatus> {
    return checkHealth(this.options.baseUrl);
  }

  private credentials(): Credentials {
    const parsed = credentialsSchema.safeParse({
      email: this.options.email,
      apiKey: this.options.apiKey,
      password: this.options.password
    });
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => e.message);
      throw new ValidationError(`invalid credentials: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
  }

  private async authenticate(credentials: Credentials): Promise<RegistryAuth> {
    if (credentials.apiKey) return { kind: 'apiKey', apiKey: credentials.apiKey };
    if (credentials.password) {
      const token = await login(this.options.baseUrl, credentials.email, credentials.password);
      return { kind: 'bearer', token };
    }
    throw new ValidationError('authentication required: provide either an API key or a password');
  }
}

export default AgentRegistryClient;
