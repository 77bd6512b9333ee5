import { capabilityBreadth, whenCapability, whenCountAbove } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { excerpt, has, hasAny, isMapping, listOf, Mapping, mappingOf, nameOf, pick, read, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

function addModel(model: unknown, draft: RecordDraft) {
  const text = textOf(model);
  if (text === undefined) return;
  draft.meta('model', text);
  draft.tag('model', text);
}

function addTools(tools: unknown, draft: RecordDraft) {
  const list = listOf(tools);
  if (!list) return;
  const names: string[] = [];
  for (const tool of list) {
    const name = nameOf(tool, ['name', 'type']) ?? 'unknown';
    names.push(name);
    draft.tag('tool', name);
    const type = isMapping(tool) ? textOf(tool.type) ?? name : name;
    if (type === 'web_search' || type === 'brave_search') draft.tag('web_search');
    if (type === 'code_interpreter') draft.tag('code_execution');
  }
  draft.meta('tools', names);
  draft.meta('toolCount', names.length);
  draft.tag('tools', names.length);
}

function addMemory(memory: unknown, draft: RecordDraft) {
  if (!truthy(memory)) return;
  draft.tag('memory');
  const config = mappingOf(memory);
  if (config) {
    draft.meta('memoryType', textOf(config.type));
    draft.meta('memoryStore', textOf(config.store));
  }
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  const agent = mappingOf(pick(source, 'agent_config', 'agent'));
  if (agent) {
    const systemPrompt = textOf(agent.system_prompt);
    if (systemPrompt !== undefined) {
      draft.meta('systemPrompt', systemPrompt);
      draft.claim('description', excerpt(systemPrompt));
    }
    addModel(agent.model, draft);
    draft.meta('temperature', agent.temperature);
  }
  addModel(source.model, draft);
  addTools(source.tools, draft);
  addMemory(source.memory, draft);

  if (has(source, 'safety')) {
    draft.tag('safety');
    const shields = listOf(mappingOf(source.safety)?.shields);
    if (shields) {
      draft.meta('shields', shields);
      draft.tag('shields', shields.length);
    }
  }
  if (hasAny(source, 'multi_turn', 'turn_config')) {
    draft.tag('multi_turn');
    draft.meta('maxTurns', mappingOf(pick(source, 'multi_turn', 'turn_config'))?.max_turns);
  }
  if (truthy(source.code_execution)) draft.tag('code_execution');
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  draft.meta('agentClass', typeName);
  draft.fallback('description', `Llama Stack ${typeName}`);
  const config = read(instance, 'config');
  if (typeof config === 'object' && config !== null) {
    addModel(read(config, 'model'), draft);
    addTools(read(config, 'tools'), draft);
    const instructions = textOf(pick(config, 'instructions', 'systemPrompt', 'system_prompt'));
    if (instructions !== undefined) draft.claim('description', excerpt(instructions));
  }
  addMemory(read(instance, 'memory'), draft);
}

export const llamastackAdapter = defineAdapter({
  tag: 'llamastack',
  label: 'Meta Llama Stack',
  defaults: { name: 'Unnamed Llama Stack Agent', description: 'Meta Llama Stack agentic application' },
  fingerprint: (source) => hasAny(source, 'agent_config', 'safety', 'multi_turn', 'turn_config'),
  instanceMarker: markedBy(/llama_?stack/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapability('memory:enabled', 5),
    whenCapability('safety:enabled', 5),
    whenCapability('code_execution:enabled', 5),
    whenCountAbove('toolCount', 3, 3),
    whenCapability('multi_turn:enabled', 3)
  ]
});

export default llamastackAdapter;
