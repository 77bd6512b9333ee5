import { capabilityBreadth, whenCapability, whenCountAbove, whenMetadata } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { has, hasAny, isMapping, listOf, Mapping, mappingOf, nameOf, namesOf, pick, textOf } from './fields';
import { RecordDraft } from './recordDraft';

const COMPLIANCE_LANGUAGE = /complian|gdpr|hipaa|privacy|regulat|audit/i;

function addVariables(variables: unknown, draft: RecordDraft) {
  const list = listOf(variables);
  if (!list) return;
  const names = namesOf(list, ['name', 'developer_name', 'developerName']);
  draft.meta('variables', names);
  draft.meta('variableCount', names.length);
  draft.tag('variables', names.length);
}

function addSystemMessages(messages: unknown, draft: RecordDraft) {
  const list = listOf(messages);
  if (!list || list.length === 0) return;
  const texts = list
    .map((message) => nameOf(message, ['message', 'text']))
    .filter((text): text is string => text !== undefined);
  draft.meta('systemMessages', texts);
  draft.tag('instructions');
  if (texts.some((text) => COMPLIANCE_LANGUAGE.test(text))) draft.tag('compliance');
}

function addAgent(agent: object, draft: RecordDraft) {
  const template = textOf(pick(agent, 'agent_template_type', 'agentTemplateType'));
  if (template !== undefined) {
    draft.meta('templateType', template);
    draft.tag('template', template);
  }
  draft.meta('agentforceAgentType', textOf(pick(agent, 'agent_type', 'agentType')));
  const company = textOf(pick(agent, 'company_name', 'companyName'));
  if (company !== undefined) {
    draft.meta('companyName', company);
    draft.fallback('owner', company);
  }
  const domain = textOf(pick(agent, 'domain'));
  if (domain !== undefined) {
    draft.meta('domain', domain);
    draft.tag('domain', domain);
  }
  const utterances = listOf(pick(agent, 'sample_utterances', 'sampleUtterances'));
  if (utterances) {
    draft.meta('utteranceCount', utterances.length);
    draft.tag('utterances', utterances.length);
  }
  addVariables(pick(agent, 'variables'), draft);
  addSystemMessages(pick(agent, 'system_messages', 'systemMessages'), draft);
  const topics = listOf(pick(agent, 'topics'));
  if (topics) {
    const names = namesOf(topics, ['name', 'label']);
    draft.meta('topics', names);
    draft.meta('topicCount', names.length);
    names.forEach((topic) => draft.tag('topic', topic));
  }
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  const deployment = mappingOf(source.deployResult);
  const agent = mappingOf(source.agent);
  if (deployment && agent) {
    draft.meta('salesforceId', textOf(source.id));
    draft.meta('deploymentStatus', textOf(deployment.status) ?? 'unknown');
    addAgent(agent, draft);
    draft.passThrough(agent);
    return;
  }
  addAgent(source, draft);
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  draft.meta('agentClass', typeName);
  draft.fallback('description', `Agentforce ${typeName}`);
  addAgent(instance, draft);
}

export const agentforceAdapter = defineAdapter({
  tag: 'agentforce',
  label: 'Salesforce Agentforce',
  defaults: { name: 'Unnamed Agentforce Agent', description: 'Salesforce Agentforce AI agent' },
  fingerprint: (source) =>
    hasAny(source, 'agent_template_type', 'sample_utterances') ||
    (isMapping(source.deployResult) && isMapping(source.agent)) ||
    (has(source, 'company_name') && has(source, 'topics')),
  instanceMarker: markedBy(/agentforce/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapability('compliance:enabled', 5),
    whenCountAbove('topicCount', 2, 3),
    whenCountAbove('variableCount', 0, 2),
    whenMetadata('salesforceId', 3)
  ]
});

export default agentforceAdapter;
