import { capabilityBreadth, whenCapability, whenCountAbove } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { excerpt, has, hasAny, listOf, Mapping, namesOf, pick, read, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

function addFunctions(functions: unknown, draft: RecordDraft) {
  const list = listOf(functions);
  if (!list || list.length === 0) return;
  const names = namesOf(list);
  draft.meta('functionCount', list.length);
  draft.meta('functions', names);
  draft.tag('functions', list.length);
  names.forEach((name) => draft.tag('function', name));
}

function addModel(model: unknown, draft: RecordDraft) {
  const text = textOf(model);
  if (text === undefined) return;
  draft.meta('model', text);
  draft.tag('model', text);
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  const instructions = textOf(source.instructions);
  if (instructions !== undefined) {
    draft.meta('instructions', instructions);
    draft.claim('description', excerpt(instructions));
  }
  addFunctions(source.functions, draft);
  addModel(source.model, draft);
  const agents = listOf(source.agents);
  if (agents) {
    draft.meta('agentCount', agents.length);
    draft.meta('agentNames', namesOf(agents));
    draft.tag('agents', agents.length);
  }
  if (hasAny(source, 'handoffs', 'can_handoff_to')) {
    draft.tag('handoffs');
    const targets = listOf(pick(source, 'handoffs', 'can_handoff_to'));
    if (targets && targets.length > 0) draft.meta('handoffTargets', namesOf(targets));
  }
  if (has(source, 'routines')) {
    draft.tag('routines');
    const routines = listOf(source.routines);
    if (routines) draft.meta('routineCount', routines.length);
  }
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  draft.meta('agentClass', typeName);
  const instructions = read(instance, 'instructions');
  if (typeof instructions === 'function') {
    draft.tag('dynamic_instructions');
    draft.claim('description', 'Swarm agent with dynamic instructions');
  } else {
    const text = textOf(instructions);
    if (text !== undefined) {
      draft.meta('instructions', text);
      draft.claim('description', excerpt(text));
    }
  }
  addFunctions(read(instance, 'functions'), draft);
  addModel(read(instance, 'model'), draft);
  if (truthy(pick(instance, 'handoffs', 'canHandoffTo'))) draft.tag('handoffs');
}

export const swarmAdapter = defineAdapter({
  tag: 'swarm',
  label: 'OpenAI Swarm',
  defaults: { name: 'Unnamed Swarm Agent', description: 'OpenAI Swarm agent for lightweight orchestration' },
  fingerprint: (source) =>
    hasAny(source, 'handoffs', 'can_handoff_to', 'routines') ||
    (has(source, 'instructions') && has(source, 'functions')),
  instanceMarker: markedBy(/swarm/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapability('handoffs:enabled', 5),
    whenCapability('dynamic_instructions:enabled', 3),
    whenCountAbove('functionCount', 3, 3),
    whenCountAbove('agentCount', 1, 5)
  ]
});

export default swarmAdapter;
