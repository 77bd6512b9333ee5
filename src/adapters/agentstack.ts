import { capabilityBreadth, whenCountAbove, whenMetadata } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { excerpt, has, hasAny, isMapping, listOf, Mapping, mappingOf, nameOf, namesOf, pick, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

// snake_case agent setting -> metadata key
const AGENT_SETTINGS: ReadonlyArray<[string, string]> = [
  ['max_loops', 'maxLoops'],
  ['autosave', 'autosave'],
  ['dashboard', 'dashboard'],
  ['verbose', 'verbose'],
  ['dynamic_temperature_enabled', 'dynamicTemperature'],
  ['saved_state_path', 'savedStatePath'],
  ['user_name', 'userName'],
  ['retry_attempts', 'retryAttempts'],
  ['context_length', 'contextLength'],
  ['return_step_meta', 'returnStepMeta'],
  ['output_type', 'outputType']
];

function addAgent(agent: Mapping, draft: RecordDraft) {
  draft.claim('name', agent.agent_name);
  draft.claim('name', agent.name);
  draft.fallback('name', 'AgentStack Agent');

  const systemPrompt = textOf(agent.system_prompt);
  if (systemPrompt !== undefined) {
    draft.meta('systemPrompt', systemPrompt);
    draft.claim('description', excerpt(systemPrompt));
  }
  const model = textOf(agent.model) ?? textOf(agent.llm) ?? nameOf(agent.llm, ['model_name', 'model']);
  if (model !== undefined) {
    draft.meta('model', model);
    draft.tag('model', model);
  }
  for (const [key, metaKey] of AGENT_SETTINGS) draft.meta(metaKey, agent[key]);

  const tools = listOf(agent.tools);
  if (tools) namesOf(tools).forEach((name) => draft.tag('tool', name));
  if (has(agent, 'memory') || truthy(agent.autosave)) draft.tag('memory');
  if (truthy(agent.dynamic_temperature_enabled)) draft.tag('dynamic_temperature');
  if (truthy(agent.return_step_meta)) draft.tag('step_metadata');
}

function addSwarm(agents: unknown[], source: Mapping, draft: RecordDraft) {
  draft.claim('name', source.swarm_name);
  draft.fallback('name', 'AgentStack Swarm');
  draft.fallback('description', `AgentStack swarm with ${agents.length} agents`);
  const names = namesOf(agents, ['agent_name', 'name'], 'Unknown');
  draft.meta('agentCount', agents.length);
  draft.meta('agentNames', names);
  draft.tag('agents', agents.length);
  agents.forEach((agent, index) => {
    if (isMapping(agent) && has(agent, 'system_prompt')) draft.tag('agent', names[index]);
  });
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  const agents = listOf(source.agents);
  const architecture = mappingOf(source.swarm_architecture);
  if (agents && agents.length === 1 && isMapping(agents[0])) {
    addAgent(agents[0], draft);
  } else if (agents && agents.length > 1) {
    addSwarm(agents, source, draft);
  } else if (hasAny(source, 'agent_name', 'name')) {
    addAgent(source, draft);
  } else if (architecture) {
    draft.claim('name', architecture.name);
    draft.fallback('name', 'AgentStack Swarm');
    draft.claim('description', architecture.description);
    draft.fallback('description', 'AgentStack swarm architecture');
    const swarmType = textOf(architecture.swarm_type);
    draft.meta('swarmType', swarmType ?? 'ConcurrentWorkflow');
    draft.tag('swarm_type', swarmType ?? 'unknown');
    draft.meta('task', architecture.task);
    draft.meta('maxLoops', architecture.max_loops);
  }
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  draft.meta('agentClass', typeName);
  draft.claim('name', pick(instance, 'agentName', 'agent_name'));
  const systemPrompt = textOf(pick(instance, 'systemPrompt', 'system_prompt'));
  if (systemPrompt !== undefined) {
    draft.meta('systemPrompt', systemPrompt);
    draft.claim('description', excerpt(systemPrompt));
  }
  draft.fallback('description', 'AgentStack agent');
  draft.meta('maxLoops', pick(instance, 'maxLoops', 'max_loops'));
  draft.meta('autosave', pick(instance, 'autosave'));
  draft.meta('contextLength', pick(instance, 'contextLength', 'context_length'));
  if (truthy(pick(instance, 'autosave'))) draft.tag('memory');
}

export const agentstackAdapter = defineAdapter({
  tag: 'agentstack',
  label: 'AgentStack',
  defaults: { name: 'Unnamed AgentStack Agent', description: 'AgentStack AI agent' },
  fingerprint: (source) =>
    hasAny(
      source,
      'swarm_architecture',
      'swarm_name',
      'agent_name',
      'dynamic_temperature_enabled',
      'max_loops',
      'saved_state_path',
      'autosave'
    ) ||
    (listOf(source.agents) ?? []).some((agent) => isMapping(agent) && hasAny(agent, 'agent_name', 'system_prompt')),
  instanceMarker: markedBy(/agentstack/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenMetadata('autosave', 3),
    whenCountAbove('agentCount', 1, 5),
    whenCountAbove('contextLength', 50000, 3),
    whenMetadata('dynamicTemperature', 2)
  ]
});

export default agentstackAdapter;
