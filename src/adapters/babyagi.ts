import { capabilityBreadth, whenCapability, whenCountAbove } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { has, hasAny, isMapping, listOf, Mapping, nameOf, pick, read, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

const MODEL_KEYS = ['model_name', 'modelName', 'model'];

function addObjective(objective: unknown, draft: RecordDraft) {
  const text = textOf(objective);
  if (text === undefined) return;
  draft.meta('objective', text);
  draft.claim('description', `BabyAGI pursuing: ${text}`);
  draft.tag('autonomous');
}

function addVectorstore(store: unknown, draft: RecordDraft) {
  draft.tag('memory');
  draft.tag('vectorstore');
  const type = textOf(store) ?? nameOf(store, ['type']);
  draft.meta('vectorstoreType', type ?? 'unknown');
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  addObjective(source.objective, draft);
  draft.meta('initialTask', pick(source, 'initial_task', 'first_task'));

  const tasks = listOf(pick(source, 'task_list', 'tasks'));
  if (tasks) {
    draft.meta('taskCount', tasks.length);
    draft.tag('tasks', tasks.length);
    if (tasks.length > 0 && isMapping(tasks[0])) {
      draft.meta('taskStructure', 'complex');
      draft.tag('task_prioritization');
    }
  }

  if (hasAny(source, 'vectorstore', 'memory_backend')) addVectorstore(pick(source, 'vectorstore', 'memory_backend'), draft);

  const model = textOf(pick(source, 'llm', 'model')) ?? nameOf(pick(source, 'llm', 'model'), MODEL_KEYS);
  if (model !== undefined) {
    draft.meta('model', model);
    draft.tag('model', model);
  }

  if (has(source, 'execution_chain')) {
    draft.tag('execution_chain');
    draft.meta('executionChainType', nameOf(source.execution_chain, ['type']) ?? 'default');
  }
  draft.meta('maxIterations', source.max_iterations);
  if (has(source, 'task_creation_chain')) draft.tag('task_creation');
  if (has(source, 'task_prioritization_chain')) draft.tag('task_prioritization');
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  draft.meta('agentClass', typeName);
  addObjective(read(instance, 'objective'), draft);
  const tasks = listOf(pick(instance, 'taskList', 'task_list', 'tasks'));
  if (tasks && tasks.length > 0) {
    draft.meta('taskCount', tasks.length);
    draft.tag('tasks', tasks.length);
  }
  const store = pick(instance, 'vectorstore', 'memory');
  if (truthy(store)) addVectorstore(store, draft);
  if (truthy(pick(instance, 'executionChain', 'execution_chain', 'chain'))) draft.tag('execution_chain');
  if (truthy(pick(instance, 'taskCreationChain', 'task_creation_chain'))) draft.tag('task_creation');
  if (truthy(pick(instance, 'taskPrioritizationChain', 'task_prioritization_chain'))) draft.tag('task_prioritization');
  const llm = read(instance, 'llm');
  const model = textOf(llm) ?? nameOf(llm, MODEL_KEYS);
  if (model !== undefined) {
    draft.meta('model', model);
    draft.tag('model', model);
  }
}

export const babyagiAdapter = defineAdapter({
  tag: 'babyagi',
  label: 'BabyAGI',
  defaults: { name: 'Unnamed BabyAGI Agent', description: 'Autonomous task management AI system' },
  fingerprint: (source) =>
    hasAny(source, 'objective', 'task_creation_chain', 'task_prioritization_chain', 'initial_task', 'first_task') ||
    (hasAny(source, 'vectorstore', 'memory_backend') && hasAny(source, 'task_list', 'tasks')),
  instanceMarker: markedBy(/baby_?agi/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapability('autonomous:enabled', 5),
    whenCapability('vectorstore:enabled', 5),
    whenCapability('task_creation:enabled', 5),
    whenCapability('task_prioritization:enabled', 3),
    whenCountAbove('taskCount', 5, 3)
  ]
});

export default babyagiAdapter;
