export const FRAMEWORK_TAGS = [
  'crewai',
  'langchain',
  'autogen',
  'swarm',
  'n8n',
  'babyagi',
  'bedrock_agents',
  'semantic_kernel',
  'llamaindex_agents',
  'agentstack',
  'llamastack',
  'mistral_agents',
  'agentforce',
  'google-adk'
] as const;

export type FrameworkTag = (typeof FRAMEWORK_TAGS)[number];

export type AgentType = FrameworkTag | 'unknown';

export type AgentMetadata = Record<string, unknown>;

export interface CanonicalAgentRecord {
  agentType: AgentType;
  version: string;
  name: string;
  description: string;
  owner: string;
  capabilities: string[];
  metadata: AgentMetadata;
  trustScore: number;
}

export type UnscoredAgentRecord = Omit<CanonicalAgentRecord, 'trustScore'>;

export type IdentityField = 'name' | 'description' | 'owner' | 'version';

export function isFrameworkTag(value: unknown): value is FrameworkTag {
  return FRAMEWORK_TAGS.some((tag) => tag === value);
}
