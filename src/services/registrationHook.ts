import type { AgentRegistryClient, RegisterOptions } from '../client';
import { AgentRegistryError, isAgentRegistryError } from '../lib/errors';
import { logger } from '../lib/logger';
import { RegistrationResult } from '../validators/registryResponseSchema';

export type RegistrationOutcome =
  | { ok: true; result: RegistrationResult }
  | { ok: false; error: AgentRegistryError };

export type RegistrationHook = (agent: unknown) => Promise<RegistrationOutcome>;

/**
 * Registration the caller runs after constructing an agent. SDK failures come
 * back as `{ ok: false }`; anything else is rethrown.
 */
export function createRegistrationHook(
  client: Pick<AgentRegistryClient, 'register'>,
  options: RegisterOptions = {}
): RegistrationHook {
  return async (agent) => {
    try {
      const result = await client.register(agent, options);
      return { ok: true, result };
    } catch (err) {
      if (!isAgentRegistryError(err)) throw err;
      logger.warn({ code: err.code, message: err.message }, 'agent registration failed');
      return { ok: false, error: err };
    }
  };
}

export default createRegistrationHook;
