import { capabilityBreadth, whenCapability, whenCapabilityPrefix, whenCountAbove } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { countOf, excerpt, hasAny, listOf, Mapping, mappingOf, nameOf, namesOf, pick, read, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

function addModel(model: unknown, draft: RecordDraft) {
  const text = textOf(model);
  if (text === undefined) return;
  draft.meta('model', text);
  draft.tag('model', text);
}

function addFunctions(functions: unknown, draft: RecordDraft) {
  const list = listOf(functions);
  if (!list) return;
  draft.meta('functionCount', list.length);
  draft.tag('functions', list.length);
}

function addPlugins(plugins: unknown, draft: RecordDraft) {
  const list = listOf(plugins);
  const byName = mappingOf(plugins);
  if (!list && !byName) return;
  const names = list ? namesOf(list, ['name', 'plugin_name']) : Object.keys(byName ?? {});
  draft.meta('pluginCount', names.length);
  draft.meta('plugins', names);
  draft.tag('plugins', names.length);
  names.forEach((name) => draft.tag('plugin', name));
}

function addPlanner(planner: unknown, draft: RecordDraft) {
  const text = textOf(planner);
  if (text !== undefined) {
    draft.tag('planner', text.toLowerCase());
    return;
  }
  const config = mappingOf(planner);
  if (!config) return;
  draft.tag('planner', textOf(config.type) ?? 'sequential');
  draft.meta('plannerConfig', config);
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  const kernel = mappingOf(pick(source, 'kernel_config', 'kernel'));
  if (kernel) {
    const service = mappingOf(kernel.ai_service);
    if (service) {
      addModel(service.model, draft);
      draft.tag('ai_service', textOf(service.service_type));
    }
    addModel(kernel.model, draft);
    addFunctions(kernel.functions, draft);
  }

  const agent = mappingOf(source.agent);
  if (agent) {
    const instructions = textOf(agent.instructions);
    if (instructions !== undefined) {
      draft.meta('instructions', instructions);
      draft.claim('description', excerpt(instructions));
    }
    addPlugins(agent.plugins, draft);
  }

  addPlugins(source.plugins, draft);
  const skills = listOf(source.skills);
  if (skills) {
    draft.meta('skillCount', skills.length);
    draft.tag('skills', skills.length);
  }
  addFunctions(source.functions, draft);
  addPlanner(source.planner, draft);

  if (truthy(source.memory)) {
    draft.tag('memory');
    draft.meta('memoryType', nameOf(source.memory, ['type']) ?? 'semantic');
  }
  if (hasAny(source, 'process', 'workflow')) {
    draft.tag('process');
    draft.meta('hasProcess', true);
  }
  if (truthy(source.orchestration)) draft.tag('orchestration');
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  if (typeName.endsWith('Agent')) {
    draft.meta('agentClass', typeName);
    draft.tag('agent');
    draft.fallback('description', 'Semantic Kernel AI Agent');
    const instructions = textOf(read(instance, 'instructions'));
    if (instructions !== undefined) draft.meta('instructions', instructions.slice(0, 500));
    const kernel = read(instance, 'kernel');
    if (typeof kernel === 'object' && kernel !== null) {
      const plugins = countOf(read(kernel, 'plugins'));
      if (plugins !== undefined) draft.tag('plugins', plugins);
      if (truthy(read(kernel, 'memory'))) draft.tag('memory');
    }
  } else if (typeName.includes('Planner')) {
    draft.meta('plannerType', typeName);
    draft.fallback('description', `Semantic Kernel ${typeName}`);
    draft.tag('planner', typeName.replace('Planner', '').toLowerCase() || 'default');
  } else if (typeName.includes('Kernel')) {
    draft.meta('kernelClass', typeName);
    draft.fallback('description', 'Semantic Kernel orchestration instance');
    const plugins = countOf(read(instance, 'plugins'));
    if (plugins !== undefined) {
      draft.meta('pluginCount', plugins);
      draft.tag('plugins', plugins);
    }
    const services = pick(instance, 'services', 'aiServices', 'ai_services');
    const serviceIds = services instanceof Map ? [...services.keys()] : Object.keys(mappingOf(services) ?? {});
    serviceIds.forEach((id) => draft.tag('ai_service', textOf(id)));
    if (truthy(read(instance, 'memory'))) draft.tag('memory');
  }
}

export const semanticKernelAdapter = defineAdapter({
  tag: 'semantic_kernel',
  label: 'Microsoft Semantic Kernel',
  defaults: { name: 'Unnamed Semantic Kernel Agent', description: 'Microsoft Semantic Kernel AI orchestration' },
  fingerprint: (source) => hasAny(source, 'kernel_config', 'kernel', 'planner', 'skills', 'plugins'),
  instanceMarker: markedBy(/Kernel|Planner$|ChatCompletionAgent/),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapabilityPrefix('planner:', 5),
    whenCapabilityPrefix('plugin:', 3),
    whenCapability('memory:enabled', 5),
    whenCapability('process:enabled', 5),
    whenCountAbove('functionCount', 5, 3)
  ]
});

export default semanticKernelAdapter;
