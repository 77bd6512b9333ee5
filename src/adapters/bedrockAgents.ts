import { capabilityBreadth, whenCapability, whenCountAbove } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { excerpt, has, hasAny, isMapping, listOf, Mapping, mappingOf, nameOf, pick, read, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

function addActionGroups(groups: unknown, draft: RecordDraft) {
  const list = listOf(groups);
  if (!list || list.length === 0) return;
  const names: string[] = [];
  for (const group of list) {
    const name = nameOf(group, ['action_group_name', 'actionGroupName', 'name']) ?? 'unknown';
    names.push(name);
    draft.tag('action_group', name);
    if (!isMapping(group)) continue;
    if (hasAny(group, 'api_schema', 'openapi_schema')) draft.tag('api_schema', 'defined');
    const executor = mappingOf(group.action_group_executor);
    if (executor && has(executor, 'lambda')) draft.tag('lambda');
  }
  draft.meta('actionGroups', names);
  draft.meta('actionGroupCount', names.length);
  draft.tag('action_groups');
}

function addKnowledgeBases(bases: unknown, draft: RecordDraft) {
  const list = listOf(bases);
  if (!list || list.length === 0) return;
  const ids: string[] = [];
  const descriptions: Record<string, string> = {};
  for (const base of list) {
    const id = nameOf(base, ['knowledge_base_id', 'knowledgeBaseId', 'id']) ?? 'unknown';
    ids.push(id);
    draft.tag('knowledge_base', id);
    const description = isMapping(base) ? textOf(base.description) : undefined;
    if (description !== undefined) descriptions[id] = description;
  }
  draft.meta('knowledgeBases', ids);
  draft.meta('knowledgeBaseCount', ids.length);
  if (Object.keys(descriptions).length > 0) draft.meta('knowledgeBaseDescriptions', descriptions);
  draft.tag('knowledge_bases');
}

function addInstruction(instruction: unknown, draft: RecordDraft, claim: boolean) {
  const text = textOf(instruction);
  if (text === undefined) return;
  draft.meta('instruction', text);
  if (claim) draft.claim('description', excerpt(text));
  else draft.fallback('description', excerpt(text));
}

function addFoundationModel(model: unknown, draft: RecordDraft) {
  const text = textOf(model);
  if (text === undefined) return;
  draft.meta('foundationModel', text);
  draft.tag('model', text);
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  draft.claim('name', source.agent_name);
  addInstruction(source.instruction, draft, false);
  addFoundationModel(source.foundation_model, draft);
  const role = textOf(source.agent_resource_role_arn);
  if (role !== undefined) {
    draft.meta('agentResourceRoleArn', role);
    draft.tag('iam', 'configured');
  }
  addActionGroups(source.action_groups, draft);
  addKnowledgeBases(source.knowledge_bases, draft);

  if (truthy(source.guardrails)) {
    draft.tag('guardrails');
    const guardrails = mappingOf(source.guardrails);
    if (guardrails) {
      draft.meta('guardrailId', pick(guardrails, 'guardrail_id', 'id'));
      draft.meta('guardrailVersion', pick(guardrails, 'guardrail_version', 'version'));
    }
  }
  if (has(source, 'prompt_override_configuration')) {
    draft.tag('prompt_override');
    draft.meta('promptOverride', true);
  }
  draft.meta('idleSessionTtl', source.idle_session_ttl);
  const encryptionKey = textOf(source.customer_encryption_key_arn);
  if (encryptionKey !== undefined) {
    draft.meta('customerEncryptionKeyArn', encryptionKey);
    draft.tag('encryption', 'custom');
  }
  draft.meta('tags', mappingOf(source.tags));
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  draft.meta('agentClass', typeName);
  draft.claim('name', pick(instance, 'agentName', 'agent_name'));
  if (typeName.includes('Agent')) {
    draft.tag('managed');
    draft.fallback('description', 'Amazon Bedrock managed AI agent');
  }
  draft.meta('agentId', pick(instance, 'agentId', 'agent_id'));
  draft.meta('agentArn', pick(instance, 'agentArn', 'agent_arn'));
  draft.meta('agentVersion', pick(instance, 'agentVersion', 'agent_version'));
  addInstruction(read(instance, 'instruction'), draft, true);
  addFoundationModel(pick(instance, 'foundationModel', 'foundation_model'), draft);
  addActionGroups(pick(instance, 'actionGroups', 'action_groups'), draft);
  addKnowledgeBases(pick(instance, 'knowledgeBases', 'knowledge_bases'), draft);
  if (truthy(read(instance, 'guardrails'))) draft.tag('guardrails');
}

export const bedrockAgentsAdapter = defineAdapter({
  tag: 'bedrock_agents',
  label: 'Amazon Bedrock Agents',
  defaults: { name: 'Unnamed Bedrock Agent', description: 'AWS Bedrock managed AI agent' },
  fingerprint: (source) =>
    hasAny(
      source,
      'action_groups',
      'foundation_model',
      'knowledge_bases',
      'agent_resource_role_arn',
      'idle_session_ttl',
      'prompt_override_configuration'
    ),
  instanceMarker: markedBy(/bedrock/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapability('action_groups:enabled', 5),
    whenCapability('knowledge_bases:enabled', 5),
    whenCapability('guardrails:enabled', 5),
    whenCountAbove('actionGroupCount', 2, 3),
    whenCountAbove('knowledgeBaseCount', 0, 3),
    whenCapability('iam:configured', 2)
  ]
});

export default bedrockAgentsAdapter;
