import * as yaml from 'js-yaml';
import { logger } from '../lib/logger';
import { isMapping, Mapping } from '../adapters/fields';

export type ParsedAgentConfig =
  | { kind: 'mapping'; value: Mapping }
  | { kind: 'text'; value: string };

function looksLikeJson(text: string) {
  const trimmed = text.trim();
  return trimmed.startsWith('{') && trimmed.endsWith('}');
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    logger.debug({ err }, 'agent config is not JSON');
    return undefined;
  }
}

function tryYaml(text: string): unknown {
  try {
    return yaml.load(text);
  } catch (err) {
    logger.debug({ err }, 'agent config is not YAML');
    return undefined;
  }
}

/**
 * Reads an agent definition given as text. Only a mapping counts as structured
 * config; scalars, lists and unparseable text come back as free text.
 */
export function parseAgentConfig(raw: string): ParsedAgentConfig {
  if (!raw.trim()) return { kind: 'text', value: raw };
  const parsed = looksLikeJson(raw) ? tryJson(raw) ?? tryYaml(raw) : tryYaml(raw);
  if (isMapping(parsed)) return { kind: 'mapping', value: parsed };
  return { kind: 'text', value: raw };
}

export default parseAgentConfig;
