import { capabilityBreadth, whenCountAbove } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { excerpt, has, hasAny, listOf, Mapping, nameOf, namesOf, pick, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

const WORKFLOW_AGENTS = /^(Sequential|Parallel|Loop)Agent$/;

function addTools(tools: unknown, draft: RecordDraft) {
  const list = listOf(tools);
  if (!list) return;
  const names = namesOf(list);
  names.forEach((name) => draft.tag('tool', name));
  draft.meta('tools', names);
  draft.meta('toolCount', names.length);
}

function addSubAgents(agents: unknown, draft: RecordDraft) {
  const list = listOf(agents);
  if (!list || list.length === 0) return;
  draft.meta('agentCount', list.length);
  draft.meta('agentNames', namesOf(list));
  draft.tag('agents', list.length);
  addOrchestration(draft);
}

function addOrchestration(draft: RecordDraft) {
  draft.meta('orchestrationCapable', true);
  draft.tag('orchestration');
}

function addAgentClass(agentClass: string | undefined, draft: RecordDraft) {
  if (agentClass === undefined) return;
  draft.meta('agentClass', agentClass);
  const workflow = WORKFLOW_AGENTS.exec(agentClass);
  if (workflow) draft.tag('workflow', workflow[1].toLowerCase());
}

function extract(source: object, draft: RecordDraft) {
  draft.meta('framework', 'google-adk');
  const model = textOf(pick(source, 'model'));
  if (model !== undefined) {
    draft.meta('model', model);
    draft.tag('model', model);
  }
  const instruction = textOf(pick(source, 'instruction'));
  if (instruction !== undefined) {
    draft.meta('instruction', instruction);
    draft.fallback('description', excerpt(instruction));
  }
  addTools(pick(source, 'tools'), draft);
  addSubAgents(pick(source, 'sub_agents', 'subAgents'), draft);
  if (truthy(pick(source, 'orchestration_capable', 'orchestrationCapable'))) addOrchestration(draft);

  if (hasAny(source, 'output_schema', 'outputSchema') || truthy(pick(source, 'structured_output', 'structuredOutput'))) {
    draft.meta('structuredOutput', true);
    draft.tag('structured_output');
  }
  draft.meta('outputKey', textOf(pick(source, 'output_key', 'outputKey')));

  if (hasAny(source, 'session_service', 'sessionService')) {
    const service = pick(source, 'session_service', 'sessionService');
    draft.meta('sessionService', textOf(service) ?? nameOf(service, ['type', 'name']) ?? 'configured');
    draft.tag('session');
  }
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  extract(source, draft);
  addAgentClass(textOf(pick(source, 'agent_class', 'type')), draft);
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  extract(instance, draft);
  addAgentClass(typeName, draft);
}

export const googleAdkAdapter = defineAdapter({
  tag: 'google-adk',
  label: 'Google Agent Development Kit',
  defaults: { name: 'Unnamed Google ADK Agent', description: 'Google Agent Development Kit agent' },
  fingerprint: (source) =>
    hasAny(source, 'sub_agents', 'output_schema', 'session_service', 'orchestration_capable', 'structured_output') ||
    (has(source, 'agent_class') && WORKFLOW_AGENTS.test(textOf(source.agent_class) ?? '')),
  instanceMarker: markedBy(/^(Llm|Sequential|Parallel|Loop)Agent$|google.?adk/i),
  fromMapping,
  fromInstance,
  bonuses: [capabilityBreadth, whenCountAbove('agentCount', 1, 5)]
});

export default googleAdkAdapter;
