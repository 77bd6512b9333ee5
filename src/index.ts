export { AgentRegistryClient, resolveOwner } from './client';
export type { ClientOptions, RegisterOptions } from './client';
export { normalizeAgentData, detectAgentType } from './services/detector';
export type { NormalizeOptions } from './services/detector';
export { calculateTrustScore, scoreRecord, BASE_TRUST_SCORE } from './services/scoring';
export type { ScoreBonus } from './services/scoring';
export { parseAgentConfig } from './services/configParser';
export { createRegistrationHook } from './services/registrationHook';
export type { RegistrationHook, RegistrationOutcome } from './services/registrationHook';
export { adapters, genericAdapter, defineAdapter, DETECTION_ORDER } from './adapters';
export type { FrameworkAdapter, AdapterDefinition } from './adapters';
export { AgentRegistryError, ValidationError, RemoteCallError } from './lib/errors';
export { FRAMEWORK_TAGS, isFrameworkTag } from './types/agent';
export type { AgentType, CanonicalAgentRecord, FrameworkTag, UnscoredAgentRecord } from './types/agent';
export type { RegistrationResult, VerificationResult, HealthStatus } from './validators/registryResponseSchema';
