import { capabilityBreadth, ScoreBonus, whenCapability } from '../services/scoring';
import { defineAdapter } from './base';
import { has, hasAny, listOf, Mapping, nameOf, namesOf, pick, read, textOf, truthy, typeNamesOf } from './fields';
import { RecordDraft } from './recordDraft';

const MODEL_KEYS = ['modelName', 'model_name', 'model'];

function addTools(tools: unknown, draft: RecordDraft) {
  const list = listOf(tools);
  if (!list) return;
  const names = namesOf(list);
  names.forEach((name) => draft.tag('tool', name));
  draft.meta('tools', names);
}

function addLlmInfo(llm: unknown, draft: RecordDraft) {
  if (typeof llm !== 'object' || llm === null) return;
  const model = nameOf(llm, MODEL_KEYS);
  if (model !== undefined) {
    draft.meta('model', model);
    draft.tag('model', model);
  }
  draft.meta('temperature', read(llm, 'temperature'));
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  const agentType = textOf(source.agent_type);
  if (agentType !== undefined) {
    draft.meta('langchainAgentType', agentType);
    draft.fallback('name', `LangChain ${agentType} Agent`);
  }
  const llm = textOf(source.llm) ?? nameOf(source.llm, MODEL_KEYS);
  if (llm !== undefined) {
    draft.meta('llm', llm);
    draft.tag('llm', llm);
  }
  addTools(source.tools, draft);
  if (truthy(source.memory)) {
    draft.tag('memory');
    draft.meta('memory', source.memory);
  }
  if (has(source, 'prompt')) {
    draft.meta('hasPrompt', true);
    const prompt = textOf(source.prompt);
    if (prompt !== undefined && prompt.length > 50) draft.claim('description', `${prompt.slice(0, 100)}...`);
  }
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  const kind = typeName.toLowerCase();
  if (kind.includes('agent')) {
    draft.meta('agentClass', typeName);
    draft.fallback('description', `LangChain ${typeName} agent`);
    const inner = read(instance, 'agent');
    if (typeof inner === 'object' && inner !== null) {
      const chain = pick(inner, 'llmChain', 'llm_chain');
      if (typeof chain === 'object' && chain !== null) addLlmInfo(read(chain, 'llm'), draft);
      const allowed = listOf(pick(inner, 'allowedTools', 'allowed_tools'));
      if (allowed) allowed.forEach((tool) => draft.tag('tool', nameOf(tool)));
    }
    addTools(read(instance, 'tools'), draft);
  } else if (kind.includes('chain') || kind.includes('runnable')) {
    draft.meta('chainClass', typeName);
    draft.fallback('description', `LangChain ${typeName}`);
    addLlmInfo(read(instance, 'llm'), draft);
    const chains = listOf(read(instance, 'chains'));
    if (chains) {
      draft.tag('sequential_chain', chains.length);
      draft.meta('chainSequence', chains.map((chain) => (typeof chain === 'object' && chain !== null ? typeNamesOf(chain)[0] : 'unknown')));
    }
  }
  draft.meta('verbose', read(instance, 'verbose'));
  const memory = read(instance, 'memory');
  if (typeof memory === 'object' && memory !== null) {
    draft.tag('memory');
    draft.meta('memoryType', typeNamesOf(memory)[0]);
  }
  if (truthy(read(instance, 'callbacks'))) draft.tag('callbacks');
  const tags = listOf(read(instance, 'tags'));
  if (tags && tags.length > 0) draft.meta('tags', tags);
}

const agentClassBonus: ScoreBonus = (record) => {
  const agentClass = record.metadata.agentClass;
  return typeof agentClass === 'string' && agentClass.endsWith('Agent') ? 5 : 0;
};

export const langchainAdapter = defineAdapter({
  tag: 'langchain',
  label: 'LangChain',
  defaults: { name: 'Unnamed LangChain Agent', description: 'A LangChain-based AI agent' },
  fingerprint: (source) => hasAny(source, 'agent_type', 'prompt', 'callbacks', 'lc_namespace'),
  instanceMarker: (typeNames, instance) =>
    has(instance, 'lc_namespace') ||
    typeNames.some((name) => /langchain|AgentExecutor|Chain$|^Runnable/.test(name)),
  fromMapping,
  fromInstance,
  bonuses: [capabilityBreadth, whenCapability('memory:enabled', 5), agentClassBonus]
});

export default langchainAdapter;
