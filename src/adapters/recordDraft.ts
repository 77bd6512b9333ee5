import { AgentMetadata, AgentType, IdentityField, UnscoredAgentRecord } from '../types/agent';
import { isMapping, listOf, read, textOf } from './fields';

export interface IdentityDefaults {
  name: string;
  description: string;
}

export const DEFAULT_OWNER = 'Unknown';
export const DEFAULT_VERSION = '1.0';

const IDENTITY_FIELDS: readonly IdentityField[] = ['name', 'description', 'owner', 'version'];

/**
 * Record under construction. Identity fields are first-write-wins: a claim made by
 * framework extraction beats the input's own field, which beats a framework
 * fallback, which beats the static default. Metadata keys always overwrite.
 */
export class RecordDraft {
  private readonly claims = new Map<IdentityField, string>();
  private readonly fallbacks = new Map<IdentityField, string>();
  private readonly tags = new Set<string>();
  readonly metadata: AgentMetadata = {};

  constructor(readonly agentType: AgentType) {}

  claim(field: IdentityField, value: unknown): boolean {
    const text = textOf(value);
    if (text === undefined || !text.trim() || this.claims.has(field)) return false;
    this.claims.set(field, text);
    return true;
  }

  fallback(field: IdentityField, value: unknown): void {
    const text = textOf(value);
    if (text === undefined || !text.trim() || this.fallbacks.has(field)) return;
    this.fallbacks.set(field, text);
  }

  isSet(field: IdentityField): boolean {
    return this.claims.has(field);
  }

  /** Adds `facet:value`; skipped when the value has no textual form. */
  tag(facet: string, value: unknown = 'enabled'): void {
    const text = textOf(value);
    if (text !== undefined) this.tags.add(`${facet}:${text}`);
  }

  addCapability(raw: unknown): void {
    const text = textOf(raw);
    if (text !== undefined && text.trim()) this.tags.add(text);
  }

  hasTag(tag: string): boolean {
    return this.tags.has(tag);
  }

  meta(key: string, value: unknown): void {
    if (value !== undefined) this.metadata[key] = value;
  }

  /** Copies the universal fields (and a capabilities list) from the input. */
  passThrough(source: object): void {
    for (const field of IDENTITY_FIELDS) this.claim(field, read(source, field));
    if (isMapping(source)) {
      for (const cap of listOf(source.capabilities) ?? []) this.addCapability(cap);
    }
  }

  build(defaults: IdentityDefaults): UnscoredAgentRecord {
    const resolve = (field: IdentityField, fallback: string) =>
      this.claims.get(field) ?? this.fallbacks.get(field) ?? fallback;
    return {
      agentType: this.agentType,
      version: resolve('version', DEFAULT_VERSION),
      name: resolve('name', defaults.name),
      description: resolve('description', defaults.description),
      owner: resolve('owner', DEFAULT_OWNER),
      capabilities: [...this.tags].sort(),
      metadata: { ...this.metadata }
    };
  }
}
