import { capabilityBreadth, whenCapability, whenCountAbove } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { excerpt, hasAny, isMapping, listOf, Mapping, mappingOf, nameOf, pick, read, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

// built-in tools that show up in the functions list
const BUILTIN_TOOLS = new Set(['code_interpreter', 'web_search']);

function functionName(item: unknown): string {
  if (isMapping(item) && isMapping(item.function)) return nameOf(item.function) ?? 'unknown';
  return nameOf(item, ['name', 'function', 'type']) ?? 'unknown';
}

function addFunctions(functions: unknown, draft: RecordDraft) {
  const list = listOf(functions);
  if (!list || list.length === 0) return;
  const names = list.map(functionName);
  names.forEach((name) => draft.tag('function', name));
  for (const item of list) {
    const type = isMapping(item) ? textOf(item.type) : undefined;
    if (type !== undefined && BUILTIN_TOOLS.has(type)) draft.tag(type);
  }
  draft.meta('functions', names);
  draft.meta('functionCount', names.length);
  draft.tag('functions', names.length);
  draft.tag('function_calling');
}

function addModel(model: unknown, draft: RecordDraft) {
  const text = textOf(model);
  if (text === undefined) return;
  draft.meta('model', text);
  draft.tag('model', text);
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  const systemPrompt = textOf(source.system_prompt);
  if (systemPrompt !== undefined) {
    draft.meta('systemPrompt', systemPrompt);
    draft.fallback('description', excerpt(systemPrompt));
  }
  addModel(source.model, draft);
  addFunctions(source.functions ?? source.tools, draft);

  if (truthy(source.json_mode)) draft.tag('json_mode');
  const responseFormat = mappingOf(source.response_format);
  if (responseFormat) {
    draft.meta('responseFormat', responseFormat);
    if (responseFormat.type === 'json_object') draft.tag('json_mode');
  }

  if (truthy(pick(source, 'safe_mode', 'safety_mode'))) draft.tag('safe_mode');
  const safety = mappingOf(source.safety_settings);
  if (safety) {
    draft.meta('safetySettings', safety);
    if (safety.enabled !== false) draft.tag('safe_mode');
  }

  draft.meta('temperature', source.temperature);
  draft.meta('maxTokens', source.max_tokens);
  if (truthy(source.stream)) draft.tag('streaming');

  const leChat = mappingOf(pick(source, 'lechat_config', 'le_chat'));
  if (leChat) {
    draft.meta('leChat', true);
    if (truthy(leChat.web_search)) draft.tag('web_search');
    if (truthy(leChat.code_interpreter)) draft.tag('code_interpreter');
  }
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  draft.meta('agentClass', typeName);
  draft.tag('agent');
  draft.fallback('description', 'Mistral AI agent');
  const systemPrompt = textOf(pick(instance, 'systemPrompt', 'system_prompt'));
  if (systemPrompt !== undefined) {
    draft.meta('systemPrompt', systemPrompt);
    draft.claim('description', excerpt(systemPrompt));
  }
  addModel(read(instance, 'model'), draft);
  addFunctions(pick(instance, 'functions', 'tools'), draft);
  if (truthy(pick(instance, 'jsonMode', 'json_mode'))) draft.tag('json_mode');
  if (truthy(pick(instance, 'safeMode', 'safe_mode', 'safetyMode'))) draft.tag('safe_mode');
}

export const mistralAgentsAdapter = defineAdapter({
  tag: 'mistral_agents',
  label: 'Mistral AI Agents',
  defaults: { name: 'Unnamed Mistral Agent', description: 'Mistral AI agent with advanced capabilities' },
  fingerprint: (source) =>
    hasAny(source, 'lechat_config', 'le_chat', 'json_mode', 'safe_mode', 'safety_mode', 'safety_settings') ||
    isMapping(source.response_format),
  instanceMarker: markedBy(/mistral|LeChat/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapability('function_calling:enabled', 5),
    whenCapability('json_mode:enabled', 5),
    whenCapability('safe_mode:enabled', 5),
    whenCountAbove('functionCount', 3, 3),
    whenCapability('streaming:enabled', 2)
  ]
});

export default mistralAgentsAdapter;
