import { capabilityBreadth, whenCapability, whenCountAbove } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { countOf, excerpt, has, isMapping, listOf, Mapping, mappingOf, nameOf, read, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

const AGENT_NODE = /agent|langchain/;
const TOOL_NODE = /tool|http|code|function/;

function addModel(model: unknown, draft: RecordDraft) {
  const text = textOf(model);
  if (text === undefined) return;
  draft.meta('model', text);
  draft.tag('model', text);
}

function addNodes(nodes: unknown[], draft: RecordDraft) {
  let agentNodes = 0;
  let toolNodes = 0;
  for (const node of nodes) {
    if (!isMapping(node)) continue;
    const type = (textOf(node.type) ?? '').toLowerCase();
    const name = nameOf(node) ?? 'unnamed';
    const params = mappingOf(node.parameters) ?? {};
    if (AGENT_NODE.test(type)) {
      agentNodes++;
      draft.tag('agent', name);
      draft.meta('systemPrompt', textOf(params.systemPrompt));
      addModel(params.model, draft);
      if (has(params, 'memory')) {
        draft.tag('memory');
        draft.meta('memoryType', nameOf(params.memory, ['type']) ?? 'unknown');
      }
    } else if (TOOL_NODE.test(type)) {
      toolNodes++;
      draft.tag('tool', name);
    }
  }
  draft.meta('agentNodeCount', agentNodes);
  draft.meta('toolNodeCount', toolNodes);
  draft.meta('totalNodeCount', nodes.length);
}

function addAgentNode(node: Mapping, draft: RecordDraft) {
  draft.fallback('name', 'n8n AI Agent');
  const params = mappingOf(node.parameters) ?? node;
  const systemPrompt = textOf(params.systemPrompt);
  if (systemPrompt !== undefined) {
    draft.meta('systemPrompt', systemPrompt);
    draft.claim('description', excerpt(systemPrompt));
  }
  addModel(params.model, draft);
  const tools = listOf(params.tools);
  if (tools) tools.forEach((tool) => draft.tag('tool', nameOf(tool, ['name', 'type'])));
  if (truthy(params.memory)) {
    draft.tag('memory');
    draft.meta('memoryType', nameOf(params.memory, ['type']) ?? 'buffer');
  }
  draft.meta('n8nAgentType', textOf(params.agentType));
  if (truthy(params.outputParsing)) draft.tag('output_parsing');
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  const nested = mappingOf(source.workflow);
  const workflow = nested ?? (listOf(source.nodes) ? source : undefined);
  if (workflow) {
    if (nested) {
      draft.claim('name', nested.name);
      draft.claim('description', nested.description);
    }
    draft.fallback('name', 'Unnamed n8n Workflow');
    draft.fallback('description', 'n8n AI workflow automation');
    addNodes(listOf(workflow.nodes) ?? [], draft);
    const connections = countOf(workflow.connections);
    if (connections !== undefined) draft.meta('connectionCount', connections);
  } else if (AGENT_NODE.test((textOf(source.type) ?? '').toLowerCase())) {
    addAgentNode(source, draft);
  }
  draft.meta('settings', mappingOf(source.settings));
  if (has(source, 'staticData')) draft.meta('hasStaticData', true);
  const connections = countOf(source.connections);
  if (connections !== undefined) draft.meta('connectionCount', connections);
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  draft.fallback('name', `n8n ${typeName}`);
  draft.fallback('description', 'n8n workflow automation');
  const workflow = read(instance, 'workflow');
  if (typeof workflow === 'object' && workflow !== null) {
    const nodes = listOf(read(workflow, 'nodes'));
    if (nodes) addNodes(nodes, draft);
  }
}

export const n8nAdapter = defineAdapter({
  tag: 'n8n',
  label: 'n8n',
  defaults: { name: 'Unnamed n8n Agent', description: 'n8n workflow automation with AI agents' },
  fingerprint: (source) =>
    listOf(source.nodes) !== undefined || isMapping(source.workflow) || /n8n/i.test(textOf(source.type) ?? ''),
  instanceMarker: markedBy(/n8n/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapability('memory:enabled', 5),
    whenCountAbove('agentNodeCount', 1, 5),
    whenCapability('output_parsing:enabled', 3)
  ]
});

export default n8nAdapter;
