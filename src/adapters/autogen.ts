import { capabilityBreadth, whenCapability, whenCountAbove } from '../services/scoring';
import { defineAdapter, markedBy } from './base';
import { countOf, excerpt, hasAny, listOf, Mapping, mappingOf, namesOf, pick, read, textOf, truthy } from './fields';
import { RecordDraft } from './recordDraft';

function addLlmConfig(llmConfig: unknown, draft: RecordDraft) {
  const settings = mappingOf(llmConfig);
  if (!settings) return;
  const model = textOf(settings.model);
  if (model !== undefined) {
    draft.meta('model', model);
    draft.tag('model', model);
  }
  draft.meta('temperature', settings.temperature);
  const functions = listOf(settings.functions);
  if (functions && functions.length > 0) {
    draft.tag('function_calling');
    draft.tag('functions', functions.length);
    draft.meta('functionCount', functions.length);
  }
}

function addSystemMessage(message: unknown, draft: RecordDraft) {
  const text = textOf(message);
  if (text === undefined) return;
  draft.meta('systemMessage', text);
  draft.fallback('description', excerpt(text));
}

function addCodeExecution(config: unknown, draft: RecordDraft) {
  if (!truthy(config)) return;
  draft.tag('code_execution');
  draft.meta('codeExecution', true);
}

function fromMapping(source: Mapping, draft: RecordDraft) {
  addSystemMessage(source.system_message, draft);
  addLlmConfig(source.llm_config, draft);
  addCodeExecution(pick(source, 'code_execution_config', 'code_execution'), draft);

  const humanInput = textOf(source.human_input_mode);
  if (humanInput !== undefined) {
    draft.meta('humanInputMode', humanInput);
    if (humanInput !== 'NEVER') draft.tag('human_input');
  }
  draft.meta('maxConsecutiveAutoReply', source.max_consecutive_auto_reply);

  if (textOf(source.agent_type) !== undefined) draft.meta('autogenAgentType', textOf(source.agent_type));
  else if (truthy(source.is_assistant)) draft.meta('autogenAgentType', 'AssistantAgent');
  else if (truthy(source.is_user_proxy)) draft.meta('autogenAgentType', 'UserProxyAgent');

  const groupChat = mappingOf(source.group_chat_config);
  if (groupChat) {
    draft.tag('group_chat');
    const members = listOf(groupChat.agents);
    if (members) {
      draft.meta('groupAgentCount', members.length);
      draft.tag('agents', members.length);
    }
  }

  const agents = listOf(source.agents);
  if (agents) {
    draft.meta('agentCount', agents.length);
    draft.meta('agentNames', namesOf(agents));
    draft.tag('agents', agents.length);
    draft.tag('group_chat');
  }
  draft.meta('maxRounds', source.max_round);
  draft.meta('speakerSelectionMethod', source.speaker_selection_method);
  if (truthy(source.conversable)) draft.tag('conversable');

  const functionMap = mappingOf(source.function_map);
  if (functionMap) {
    const count = countOf(functionMap) ?? 0;
    draft.meta('functionCount', count);
    draft.tag('functions', count);
  }
}

function fromInstance(instance: object, draft: RecordDraft, typeName: string) {
  draft.meta('agentClass', typeName);
  const systemMessage = pick(instance, 'systemMessage', 'system_message');
  if (typeName.includes('Assistant')) {
    draft.tag('assistant');
    const text = textOf(systemMessage);
    if (text !== undefined) draft.claim('description', excerpt(text));
    draft.fallback('description', 'AutoGen Assistant Agent');
  } else if (typeName.includes('UserProxy')) {
    draft.tag('user_proxy');
    draft.fallback('description', 'AutoGen User Proxy Agent for human interaction');
  } else if (typeName.includes('GroupChat')) {
    draft.tag('group_chat');
    draft.fallback('description', 'AutoGen Group Chat Manager for multi-agent coordination');
  }
  addSystemMessage(systemMessage, draft);
  addLlmConfig(pick(instance, 'llmConfig', 'llm_config'), draft);
  addCodeExecution(pick(instance, 'codeExecutionConfig', 'code_execution_config'), draft);
  draft.meta('maxConsecutiveAutoReply', pick(instance, 'maxConsecutiveAutoReply', 'max_consecutive_auto_reply'));
  const groupChat = read(instance, 'groupchat');
  if (typeof groupChat === 'object' && groupChat !== null) {
    const members = listOf(read(groupChat, 'agents'));
    if (members) {
      draft.meta('groupAgentCount', members.length);
      draft.tag('agents', members.length);
    }
  }
}

export const autogenAdapter = defineAdapter({
  tag: 'autogen',
  label: 'Microsoft AutoGen',
  defaults: { name: 'Unnamed AutoGen Agent', description: 'Microsoft AutoGen agent for autonomous task completion' },
  fingerprint: (source) =>
    hasAny(
      source,
      'llm_config',
      'system_message',
      'human_input_mode',
      'code_execution_config',
      'group_chat_config',
      'max_consecutive_auto_reply',
      'function_map',
      'speaker_selection_method',
      'max_round',
      'is_assistant',
      'is_user_proxy'
    ),
  instanceMarker: markedBy(/autogen|AssistantAgent|UserProxyAgent|GroupChatManager|ConversableAgent/i),
  fromMapping,
  fromInstance,
  bonuses: [
    capabilityBreadth,
    whenCapability('function_calling:enabled', 5),
    whenCapability('code_execution:enabled', 5),
    whenCapability('group_chat:enabled', 5),
    whenCountAbove('groupAgentCount', 2, 3)
  ]
});

export default autogenAdapter;
