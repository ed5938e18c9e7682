/**
 * 后端健康检查：GET /global/health，200 且 healthy === true 才算健康。
 * 永不抛错，调用方只需要一个判断结果。
 */

import type { BackendCredentials, BackendEndpoint } from '../types/backend.js';

export const HEALTH_PATH = '/global/health';
const HEALTH_TIMEOUT_MS = 3000;

export function authHeaders(credentials?: BackendCredentials): Record<string, string> {
  if (!credentials) return {};
  const token = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
  return { Authorization: `Basic ${token}` };
}

export async function isBackendHealthy(
  endpoint: BackendEndpoint,
  timeoutMs: number = HEALTH_TIMEOUT_MS,
): Promise<boolean> {
  try {
    const response = await fetch(`${endpoint.baseUrl}${HEALTH_PATH}`, {
      headers: { ...authHeaders(endpoint.credentials), Connection: 'close' },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (response.status !== 200) return false;
    const body: unknown = await response.json();
    return typeof body === 'object' && body !== null && 'healthy' in body && body.healthy === true;
  } catch {
    return false;
  }
}
