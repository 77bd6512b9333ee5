import { AgentType, CanonicalAgentRecord } from '../types/agent';
import { logger } from '../lib/logger';
import { parseAgentConfig } from '../services/configParser';
import { ScoreBonus, scoreRecord } from '../services/scoring';
import { isInstance, isMapping, Mapping, typeNamesOf } from './fields';
import { IdentityDefaults, RecordDraft } from './recordDraft';

export interface AdapterDefinition {
  tag: AgentType;
  label: string;
  defaults: IdentityDefaults;
  /** Distinctive keys that identify a mapping as this framework's. */
  fingerprint?: (source: Mapping) => boolean;
  /** Type-name test for object instances; extraction from instances only runs when it passes. */
  instanceMarker?: (typeNames: readonly string[], instance: object) => boolean;
  fromMapping: (source: Mapping, draft: RecordDraft) => void;
  fromInstance?: (instance: object, draft: RecordDraft, typeName: string) => void;
  bonuses?: readonly ScoreBonus[];
}

export interface FrameworkAdapter {
  readonly tag: AgentType;
  readonly label: string;
  detects(input: unknown): boolean;
  normalize(input: unknown): CanonicalAgentRecord;
}

export function markedBy(pattern: RegExp) {
  return (typeNames: readonly string[]) => typeNames.some((name) => pattern.test(name));
}

export function defineAdapter(definition: AdapterDefinition): FrameworkAdapter {
  const log = logger.child({ adapter: definition.tag });
  const bonuses = definition.bonuses ?? [];

  function marks(instance: object) {
    return definition.instanceMarker !== undefined && definition.instanceMarker(typeNamesOf(instance), instance);
  }

  function extract(input: unknown, draft: RecordDraft) {
    let source = input;
    if (typeof source === 'string') {
      const parsed = parseAgentConfig(source);
      if (parsed.kind === 'text') {
        draft.claim('description', parsed.value);
        return;
      }
      source = parsed.value;
    }
    if (isMapping(source)) {
      definition.fromMapping(source, draft);
      draft.passThrough(source);
    } else if (isInstance(source)) {
      if (definition.fromInstance && marks(source)) {
        const typeName = typeNamesOf(source)[0];
        definition.fromInstance(source, draft, typeName);
        draft.fallback('name', `${typeName} Instance`);
      }
      draft.passThrough(source);
    }
  }

  return {
    tag: definition.tag,
    label: definition.label,

    detects(input: unknown) {
      if (isMapping(input)) return definition.fingerprint !== undefined && definition.fingerprint(input);
      if (isInstance(input)) return marks(input);
      return false;
    },

    normalize(input: unknown) {
      const draft = new RecordDraft(definition.tag);
      try {
        extract(input, draft);
      } catch (err) {
        log.warn({ err }, 'agent extraction aborted, finishing record from partial data');
      }
      const record = draft.build(definition.defaults);
      return { ...record, trustScore: scoreRecord(record, bonuses) };
    }
  };
}
