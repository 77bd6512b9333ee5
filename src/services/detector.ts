import { CanonicalAgentRecord, FrameworkTag, isFrameworkTag } from '../types/agent';
import { adapters, DETECTION_ORDER, genericAdapter } from '../adapters';
import { isInstance, isMapping } from '../adapters/fields';
import { logger } from '../lib/logger';
import { parseAgentConfig } from './configParser';

export interface NormalizeOptions {
  /** Skip detection and use this framework's adapter. */
  framework?: FrameworkTag;
}

function declaredFramework(source: Record<string, unknown>): FrameworkTag | null {
  for (const key of ['framework', 'agentType']) {
    const value = source[key];
    if (isFrameworkTag(value)) return value;
  }
  return null;
}

/** Which framework an agent description comes from, or null when nothing matches. */
export function detectAgentType(input: unknown): FrameworkTag | null {
  let source = input;
  if (typeof source === 'string') {
    const parsed = parseAgentConfig(source);
    if (parsed.kind === 'text') return null;
    source = parsed.value;
  }
  if (!isMapping(source) && !isInstance(source)) return null;
  try {
    if (isMapping(source)) {
      const declared = declaredFramework(source);
      if (declared) return declared;
    }
    return DETECTION_ORDER.find((tag) => adapters[tag].detects(source)) ?? null;
  } catch (err) {
    logger.warn({ err }, 'agent detection aborted, treating input as unrecognized');
    return null;
  }
}

export function normalizeAgentData(input: unknown, options: NormalizeOptions = {}): CanonicalAgentRecord {
  const framework = options.framework ?? detectAgentType(input);
  const adapter = framework ? adapters[framework] : genericAdapter;
  logger.debug({ framework: adapter.tag, forced: options.framework !== undefined }, 'normalizing agent');
  return adapter.normalize(input);
}

export default { detectAgentType, normalizeAgentData };
