import { isFrameworkTag } from '../types/agent';
import { defineAdapter } from './base';
import { Mapping, mappingOf, textOf } from './fields';
import { RecordDraft } from './recordDraft';

function fromMapping(source: Mapping, draft: RecordDraft) {
  const metadata = mappingOf(source.metadata);
  if (metadata) Object.entries(metadata).forEach(([key, value]) => draft.meta(key, value));
  const declared = textOf(source.agentType ?? source.framework);
  if (declared !== undefined && !isFrameworkTag(declared)) draft.meta('declaredAgentType', declared);
}

function fromInstance(_instance: object, draft: RecordDraft, typeName: string) {
  draft.fallback('name', `${typeName} Instance`);
  draft.fallback('description', `${typeName} agent instance`);
}

/** Universal fields only, for inputs no framework adapter recognizes. */
export const genericAdapter = defineAdapter({
  tag: 'unknown',
  label: 'Generic',
  defaults: { name: 'Unnamed Agent', description: 'AI agent' },
  instanceMarker: () => true,
  fromMapping,
  fromInstance
});

export default genericAdapter;
