import axios from 'axios';
import { z } from 'zod';
import { HEALTH_PATH, LOGIN_PATH, REGISTER_PATH, USER_AGENT, VERIFY_PATH } from '../config/api';
import { RemoteCallError, RemoteOperation } from '../lib/errors';
import { logger } from '../lib/logger';
import { CanonicalAgentRecord } from '../types/agent';
import {
  HealthStatus,
  healthStatusSchema,
  loginResponseSchema,
  RegistrationResult,
  registrationResultSchema,
  VerificationResult,
  verificationResultSchema
} from '../validators/registryResponseSchema';

export type RegistryAuth = { kind: 'apiKey'; apiKey: string } | { kind: 'bearer'; token: string };

export interface RegistrationPayload {
  email: string;
  agent: CanonicalAgentRecord;
}

interface FailedResponse {
  response?: { status?: unknown; data?: unknown };
  message?: unknown;
}

function asFailedResponse(err: unknown): FailedResponse {
  return typeof err === 'object' && err !== null ? err : {};
}

function describeFailure(err: unknown): { message: string; status?: number } {
  const failed = asFailedResponse(err);
  const status = typeof failed.response?.status === 'number' ? failed.response.status : undefined;
  const data = failed.response?.data;
  let detail: string | undefined;
  if (typeof data === 'string' && data.trim()) detail = data.trim();
  else if (typeof data === 'object' && data !== null) {
    const body: { error?: unknown; message?: unknown } = data;
    if (typeof body.error === 'string') detail = body.error;
    else if (typeof body.message === 'string') detail = body.message;
  }
  if (!detail) detail = typeof failed.message === 'string' && failed.message ? failed.message : 'request failed';
  return { message: status !== undefined ? `HTTP ${status}: ${detail}` : detail, status };
}

function toRemoteCallError(operation: RemoteOperation, err: unknown): RemoteCallError {
  if (err instanceof RemoteCallError) return err;
  const { message, status } = describeFailure(err);
  logger.error({ err, operation, status }, `${operation} request failed`);
  return new RemoteCallError(operation, message, status, err);
}

function parseBody<T extends z.ZodTypeAny>(operation: RemoteOperation, schema: T, data: unknown): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`);
    throw new RemoteCallError(operation, `malformed response (${issues.join('; ')})`, undefined, parsed.error);
  }
  return parsed.data;
}

function headers(auth?: RegistryAuth): Record<string, string> {
  const out: Record<string, string> = { 'Content-Type': 'application/json', 'User-Agent': USER_AGENT };
  if (auth?.kind === 'apiKey') out['X-API-Key'] = auth.apiKey;
  if (auth?.kind === 'bearer') out.Authorization = `Bearer ${auth.token}`;
  return out;
}

function endpoint(baseUrl: string, path: string) {
  return `${baseUrl.replace(/\/+$/, '')}${path}`;
}

/** Exchanges email and password for a bearer token. */
export async function login(baseUrl: string, email: string, password: string): Promise<string> {
  try {
    const res = await axios.post(endpoint(baseUrl, LOGIN_PATH), { email, password }, { headers: headers() });
    return parseBody('login', loginResponseSchema, res.data).token;
  } catch (err) {
    throw toRemoteCallError('login', err);
  }
}

export async function registerAgent(
  baseUrl: string,
  payload: RegistrationPayload,
  auth: RegistryAuth
): Promise<RegistrationResult> {
  try {
    const res = await axios.post(endpoint(baseUrl, REGISTER_PATH), payload, { headers: headers(auth) });
    const result = parseBody('register', registrationResultSchema, res.data);
    logger.info({ agentId: result.agentId, status: result.status }, 'agent registered');
    return result;
  } catch (err) {
    throw toRemoteCallError('register', err);
  }
}

export async function verifyAgent(baseUrl: string, agentId: string): Promise<VerificationResult> {
  try {
    const url = endpoint(baseUrl, `${VERIFY_PATH}/${encodeURIComponent(agentId)}`);
    const res = await axios.get(url, { headers: headers() });
    return parseBody('verify', verificationResultSchema, res.data);
  } catch (err) {
    throw toRemoteCallError('verify', err);
  }
}

export async function checkHealth(baseUrl: string): Promise<HealthStatus> {
  try {
    const res = await axios.get(endpoint(baseUrl, HEALTH_PATH), { headers: headers() });
    return parseBody('health', healthStatusSchema, res.data);
  } catch (err) {
    throw toRemoteCallError('health', err);
  }
}

export default { login, registerAgent, verifyAgent, checkHealth };
