import { capabilityBreadth, whenCapability, whenCountAbove } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { countOf, has, hasAny, isMapping, listOf, Mapping, mappingOf, nameOf, namesOf, pick, read, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

function addTools(tools: unknown, draft: RecordDraft) {
  const list = listOf(tools);
  if (!list) return;
  const names = namesOf(list, ['name', 'tool_name', 'toolName']);
  names.forEach((name) => draft.tag('tool', name));
  draft.meta('tools', names);
  draft.meta('toolCount', names.length);
  draft.tag('tools', names.length);
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  const service = mappingOf(pick(source, 'agent_service', 'service'));
  if (service) {
    if (has(service, 'service_name')) {
      draft.tag('microservice');
      draft.meta('serviceName', textOf(service.service_name));
    }
    draft.claim('description', service.description);
    draft.meta('host', service.host);
    draft.meta('port', service.port);
  }

  const agent = mappingOf(source.agent);
  if (agent) {
    draft.meta('systemPrompt', textOf(agent.system_prompt));
    addTools(agent.tools, draft);
  }
  addTools(source.tools, draft);

  if (has(source, 'orchestrator')) {
    draft.tag('orchestrator');
    const agents = listOf(mappingOf(source.orchestrator)?.agents);
    if (agents) {
      draft.meta('agentCount', agents.length);
      draft.meta('agentNames', namesOf(agents, ['name', 'service_name']));
      draft.tag('agents', agents.length);
    }
  }
  if (has(source, 'message_queue')) {
    draft.tag('message_queue');
    draft.meta('messageQueueType', nameOf(source.message_queue, ['type']) ?? 'unknown');
  }
  if (has(source, 'control_plane')) draft.tag('control_plane');
  if (truthy(pick(source, 'human_in_loop', 'human_approval'))) draft.tag('human_in_loop');
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  draft.meta('agentClass', typeName);
  if (typeName.includes('Service')) {
    draft.tag('microservice');
    draft.fallback('description', 'LlamaIndex agent microservice');
    draft.meta('serviceName', textOf(pick(instance, 'serviceName', 'service_name')));
    draft.meta('host', read(instance, 'host'));
    draft.meta('port', read(instance, 'port'));
  } else if (typeName.includes('Orchestrator')) {
    draft.tag('orchestrator');
    draft.fallback('description', 'LlamaIndex multi-agent orchestrator');
  } else if (typeName.includes('Agent') || typeName.includes('Worker')) {
    draft.tag('agent');
    draft.fallback('description', 'LlamaIndex agent worker');
    const tools = countOf(read(instance, 'tools'));
    if (tools !== undefined) {
      draft.meta('toolCount', tools);
      draft.tag('tools', tools);
    }
  }
}

export const llamaindexAgentsAdapter = defineAdapter({
  tag: 'llamaindex_agents',
  label: 'LlamaIndex Agents',
  defaults: { name: 'Unnamed LlamaIndex Agent', description: 'LlamaIndex multi-agent microservice' },
  fingerprint: (source) =>
    hasAny(source, 'agent_service', 'message_queue', 'control_plane', 'orchestrator') ||
    (isMapping(source.service) && has(source.service, 'service_name')),
  instanceMarker: markedBy(/llama_?index|AgentService|AgentWorker|AgentOrchestrator/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapability('microservice:enabled', 5),
    whenCapability('orchestrator:enabled', 5),
    whenCapability('message_queue:enabled', 3),
    whenCapability('control_plane:enabled', 3),
    whenCountAbove('agentCount', 2, 5)
  ]
});

export default llamaindexAgentsAdapter;
