import { UnscoredAgentRecord } from '../types/agent';

export const BASE_TRUST_SCORE = 70;
export const GENERIC_AGENT_NAME = 'Unnamed Agent';
export const MAX_TRUST_SCORE = 100;

/** A framework bonus: points awarded for one salient trait of the pre-score record. */
export type ScoreBonus = (record: UnscoredAgentRecord) => number;

function isGoogleAdk(record: UnscoredAgentRecord) {
  return record.agentType === 'google-adk' || record.metadata.framework === 'google-adk';
}

export function clampTrustScore(score: number): number {
  if (!Number.isFinite(score) || score < 0) return 0;
  if (score > MAX_TRUST_SCORE) return MAX_TRUST_SCORE;
  return Math.round(score);
}

export function calculateTrustScore(record: UnscoredAgentRecord): number {
  let score = BASE_TRUST_SCORE;
  if (record.name && record.name !== GENERIC_AGENT_NAME) score += 5;
  const descriptionLength = record.description ? record.description.length : 0;
  if (descriptionLength > 50) score += 5;
  if (descriptionLength > 100) score += 5;
  if (record.capabilities.length > 0) score += 5;
  if (record.capabilities.length > 3) score += 5;
  if (record.version) score += 5;
  if (isGoogleAdk(record)) {
    if (record.metadata.structuredOutput) score += 5;
    if (record.metadata.orchestrationCapable) score += 3;
    if (record.metadata.sessionService !== undefined) score += 2;
  }
  return clampTrustScore(score);
}

export function scoreRecord(record: UnscoredAgentRecord, bonuses: readonly ScoreBonus[] = []): number {
  const total = bonuses.reduce((sum, bonus) => sum + bonus(record), calculateTrustScore(record));
  return clampTrustScore(total);
}

// bonus builders shared by the adapters

export const capabilityBreadth: ScoreBonus = (record) => Math.min(5, record.capabilities.length);

export function whenCapability(tag: string, points: number): ScoreBonus {
  return (record) => (record.capabilities.includes(tag) ? points : 0);
}

export function whenCapabilityPrefix(prefix: string, points: number): ScoreBonus {
  return (record) => (record.capabilities.some((cap) => cap.startsWith(prefix)) ? points : 0);
}

export function whenMetadata(key: string, points: number): ScoreBonus {
  return (record) => (record.metadata[key] ? points : 0);
}

export function whenCountAbove(key: string, threshold: number, points: number): ScoreBonus {
  return (record) => {
    const value = record.metadata[key];
    return typeof value === 'number' && value > threshold ? points : 0;
  };
}

export default { calculateTrustScore, scoreRecord, clampTrustScore };
