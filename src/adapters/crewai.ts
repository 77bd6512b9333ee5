import { capabilityBreadth, whenCapability, whenCountAbove, whenMetadata } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { excerpt, has, hasAny, listOf, Mapping, nameOf, namesOf, pick, read, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

function addTools(tools: unknown, draft: RecordDraft) {
  const list = listOf(tools);
  if (!list) return;
  const names = namesOf(list);
  names.forEach((name) => draft.tag('tool', name));
  draft.meta('tools', names);
}

function addRole(role: unknown, draft: RecordDraft) {
  const text = textOf(role);
  if (text === undefined) return;
  draft.meta('role', text);
  draft.tag('role', text);
  draft.fallback('name', `CrewAI ${text} Agent`);
}

function addLlm(llm: unknown, draft: RecordDraft) {
  if (llm === undefined || llm === null) return;
  const model = textOf(llm) ?? nameOf(llm, ['model', 'model_name', 'modelName']);
  draft.meta('llm', model ?? llm);
  draft.tag('llm', model);
}

function addCrew(agents: unknown[], draft: RecordDraft) {
  draft.meta('agentCount', agents.length);
  draft.tag('agents', agents.length);
  draft.meta('agentRoles', namesOf(agents, ['role', 'name']));
}

function addTasks(tasks: unknown[], draft: RecordDraft) {
  draft.meta('taskCount', tasks.length);
  draft.tag('tasks', tasks.length);
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  addRole(source.role, draft);
  draft.meta('goal', source.goal);
  const backstory = textOf(source.backstory);
  if (backstory !== undefined) {
    draft.meta('backstory', backstory);
    draft.fallback('description', excerpt(backstory));
  }
  addTools(source.tools, draft);
  addLlm(source.llm, draft);
  if (truthy(source.memory)) {
    draft.tag('memory');
    draft.meta('memory', source.memory);
  }
  draft.meta('maxIterations', source.max_iter);
  const agents = listOf(source.agents);
  if (agents) addCrew(agents, draft);
  const tasks = listOf(source.tasks);
  if (tasks) addTasks(tasks, draft);
  const process = textOf(source.process);
  if (process !== undefined) {
    draft.meta('process', process);
    draft.tag('process', process);
  }
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  const kind = typeName.toLowerCase();
  if (kind.includes('agent')) {
    draft.meta('agentClass', typeName);
    addRole(read(instance, 'role'), draft);
    draft.meta('goal', read(instance, 'goal'));
    const backstory = textOf(read(instance, 'backstory'));
    if (backstory !== undefined) {
      draft.meta('backstory', backstory);
      draft.claim('description', excerpt(backstory));
    }
    draft.fallback('description', `CrewAI ${typeName} agent`);
    addTools(read(instance, 'tools'), draft);
    addLlm(read(instance, 'llm'), draft);
    draft.meta('maxIterations', pick(instance, 'maxIter', 'max_iter'));
    if (truthy(read(instance, 'memory'))) draft.tag('memory');
  } else if (kind.includes('crew')) {
    draft.meta('crewClass', typeName);
    draft.fallback('description', `CrewAI ${typeName} - Multi-agent collaboration`);
    const agents = listOf(read(instance, 'agents'));
    if (agents) addCrew(agents, draft);
    const tasks = listOf(read(instance, 'tasks'));
    if (tasks) addTasks(tasks, draft);
    const process = textOf(read(instance, 'process'));
    if (process !== undefined) {
      draft.meta('process', process);
      draft.tag('process', process);
    }
    if (truthy(read(instance, 'memory'))) draft.tag('memory');
  } else if (kind.includes('task')) {
    draft.meta('taskClass', typeName);
    draft.meta('taskDescription', read(instance, 'description'));
    draft.meta('expectedOutput', pick(instance, 'expectedOutput', 'expected_output'));
    const agent = read(instance, 'agent');
    if (agent !== undefined) draft.meta('assignedAgent', nameOf(agent, ['role', 'name']));
  }
}

export const crewaiAdapter = defineAdapter({
  tag: 'crewai',
  label: 'CrewAI',
  defaults: { name: 'Unnamed CrewAI Agent', description: 'A CrewAI-based autonomous agent' },
  fingerprint: (source) =>
    has(source, 'backstory') ||
    (has(source, 'role') && has(source, 'goal')) ||
    (has(source, 'process') && hasAny(source, 'agents', 'tasks')),
  instanceMarker: markedBy(/crew/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapability('memory:enabled', 5),
    whenCountAbove('agentCount', 1, 5),
    whenMetadata('role', 3)
  ]
});

export default crewaiAdapter;
