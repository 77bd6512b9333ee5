import { FrameworkTag } from '../types/agent';
import { FrameworkAdapter } from './base';
import { agentforceAdapter } from './agentforce';
import { agentstackAdapter } from './agentstack';
import { autogenAdapter } from './autogen';
import { babyagiAdapter } from './babyagi';
import { bedrockAgentsAdapter } from './bedrockAgents';
import { crewaiAdapter } from './crewai';
import { googleAdkAdapter } from './googleAdk';
import { langchainAdapter } from './langchain';
import { llamaindexAgentsAdapter } from './llamaindexAgents';
import { llamastackAdapter } from './llamastack';
import { mistralAgentsAdapter } from './mistralAgents';
import { n8nAdapter } from './n8n';
import { semanticKernelAdapter } from './semanticKernel';
import { swarmAdapter } from './swarm';

export const adapters: Record<FrameworkTag, FrameworkAdapter> = {
  crewai: crewaiAdapter,
  langchain: langchainAdapter,
  autogen: autogenAdapter,
  swarm: swarmAdapter,
  n8n: n8nAdapter,
  babyagi: babyagiAdapter,
  bedrock_agents: bedrockAgentsAdapter,
  semantic_kernel: semanticKernelAdapter,
  llamaindex_agents: llamaindexAgentsAdapter,
  agentstack: agentstackAdapter,
  llamastack: llamastackAdapter,
  mistral_agents: mistralAgentsAdapter,
  agentforce: agentforceAdapter,
  'google-adk': googleAdkAdapter
};

/**
 * Detection order. Adapters with the most distinctive fingerprints come first so
 * that looser ones (crew roles, LangChain prompts) only see what is left.
 */
export const DETECTION_ORDER: readonly FrameworkTag[] = [
  'agentforce',
  'google-adk',
  'bedrock_agents',
  'n8n',
  'llamaindex_agents',
  'llamastack',
  'semantic_kernel',
  'mistral_agents',
  'autogen',
  'babyagi',
  'agentstack',
  'swarm',
  'crewai',
  'langchain'
];

export { genericAdapter } from './generic';
export { defineAdapter } from './base';
export type { FrameworkAdapter, AdapterDefinition } from './base';
