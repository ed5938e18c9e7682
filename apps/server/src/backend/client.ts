/**
 * opencode HTTP 客户端
 *
 * 每个调用都是独立的短连接（Connection: close，不复用连接池中的 socket）、各自带超时，
 * 没有跨调用共享的连接或熔断状态。
 * 响应解析约定：空 body / 非 JSON / 结构不符都抛 ProtocolError（带状态码和内容预览），
 * 404 抛 NotFoundError，连接失败抛 NetworkError，超时抛 BackendTimeoutError。
 */

import { authHeaders, HEALTH_PATH } from './health.js';
import {
  BackendTimeoutError,
  NetworkError,
  NotFoundError,
  ProtocolError,
} from './errors.js';
import { log } from '../utils/log.js';
import type {
  BackendEndpoint,
  BackendMessage,
  HealthStatus,
  MessagePart,
  SessionInfo,
} from '../types/backend.js';

const SESSION_TIMEOUT_MS = 10_000;
const MESSAGES_TIMEOUT_MS = 15_000;
const PREVIEW_LENGTH = 200;

/** 投递层和编排层依赖的最小接口，测试里可以直接给假实现 */
export interface BackendApi {
  health(): Promise<HealthStatus>;
  listSessions(): Promise<SessionInfo[]>;
  createSession(title?: string): Promise<SessionInfo>;
  getMessages(sessionId: string, limit: number): Promise<BackendMessage[]>;
  sendMessage(sessionId: string, text: string): Promise<BackendMessage>;
  submitPrompt(sessionId: string, text: string): Promise<void>;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTimeoutAbort(error: unknown): boolean {
  return isObject(error) && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/** fetch failed 的真正原因（ECONNREFUSED 等）在 cause 里 */
function describeFetchError(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message;
  }
  return String(error);
}

/**
 * 最后一个 type 为 text 的 part 的文本（去首尾空白）；没有则返回空字符串。
 */
export function extractFinalResult(message: BackendMessage): string {
  let result = '';
  for (const part of message.parts) {
    if (part.type === 'text' && typeof part.text === 'string') {
      result = part.text;
    }
  }
  return result.trim();
}

/**
 * session.time 可能是数字、ISO 字符串或 { created, updated }
 */
export function normalizeActivityTime(time: unknown): number | undefined {
  if (typeof time === 'number' && Number.isFinite(time)) return time;
  if (typeof time === 'string' && time) {
    const parsed = Date.parse(time);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  if (isObject(time)) {
    return normalizeActivityTime(time.updated) ?? normalizeActivityTime(time.created);
  }
  return undefined;
}

function toSessionInfo(value: unknown, endpoint: string): SessionInfo {
  if (!isObject(value) || typeof value.id !== 'string' || !value.id) {
    throw new ProtocolError(`OpenCode ${endpoint} 返回的会话缺少 id`);
  }
  return {
    id: value.id,
    title: typeof value.title === 'string' && value.title ? value.title : undefined,
    lastActivity: normalizeActivityTime(value.time),
  };
}

function toMessagePart(value: unknown): MessagePart | null {
  if (!isObject(value) || typeof value.type !== 'string') return null;
  return {
    type: value.type,
    text: typeof value.text === 'string' ? value.text : undefined,
  };
}

function toMessage(value: unknown, endpoint: string): BackendMessage {
  if (!isObject(value)) {
    throw new ProtocolError(`OpenCode ${endpoint} 返回的消息格式不正确`);
  }
  const rawParts = Array.isArray(value.parts) ? value.parts : [];
  const parts = rawParts
    .map(toMessagePart)
    .filter((part): part is MessagePart => part !== null);

  const info = isObject(value.info)
    ? {
        id: typeof value.info.id === 'string' ? value.info.id : undefined,
        role: typeof value.info.role === 'string' ? value.info.role : undefined,
      }
    : undefined;

  return info ? { info, parts } : { parts };
}

function expectArray(data: unknown, endpoint: string): unknown[] {
  if (!Array.isArray(data)) {
    throw new ProtocolError(`OpenCode ${endpoint} 应返回数组`);
  }
  return data;
}

export interface BackendClientOptions {
  /** 同步发送消息的超时 */
  messageTimeoutMs: number;
}

export class BackendClient implements BackendApi {
  constructor(
    private readonly endpoint: BackendEndpoint,
    private readonly options: BackendClientOptions,
  ) {}

  async health(): Promise<HealthStatus> {
    const data = await this.request('GET', HEALTH_PATH, { timeoutMs: SESSION_TIMEOUT_MS });
    if (!isObject(data)) {
      throw new ProtocolError(`OpenCode ${HEALTH_PATH} 返回的不是对象`);
    }
    return {
      healthy: data.healthy === true,
      version: typeof data.version === 'string' ? data.version : undefined,
    };
  }

  async listSessions(): Promise<SessionInfo[]> {
    const data = await this.request('GET', '/session', { timeoutMs: SESSION_TIMEOUT_MS });
    return expectArray(data, 'GET /session').map(item => toSessionInfo(item, 'GET /session'));
  }

  async createSession(title?: string): Promise<SessionInfo> {
    const data = await this.request('POST', '/session', {
      body: title ? { title } : {},
      timeoutMs: SESSION_TIMEOUT_MS,
    });
    return toSessionInfo(data, 'POST /session');
  }

  async getMessages(sessionId: string, limit: number): Promise<BackendMessage[]> {
    const route = `/session/${encodeURIComponent(sessionId)}/message?limit=${limit}`;
    const data = await this.request('GET', route, { timeoutMs: MESSAGES_TIMEOUT_MS });
    return expectArray(data, 'GET /session/:id/message').map(item => toMessage(item, 'GET /session/:id/message'));
  }

  async sendMessage(sessionId: string, text: string): Promise<BackendMessage> {
    const data = await this.request('POST', `/session/${encodeURIComponent(sessionId)}/message`, {
      body: { parts: [{ type: 'text', text }] },
      timeoutMs: this.options.messageTimeoutMs,
    });
    return toMessage(data, 'POST /session/:id/message');
  }

  /** prompt_async 只返回确认，body 内容不解析 */
  async submitPrompt(sessionId: string, text: string): Promise<void> {
    await this.request('POST', `/session/${encodeURIComponent(sessionId)}/prompt_async`, {
      body: { parts: [{ type: 'text', text }] },
      timeoutMs: MESSAGES_TIMEOUT_MS,
      expectBody: false,
    });
  }

  private async request(
    method: 'GET' | 'POST',
    route: string,
    opts: { body?: object; timeoutMs: number; expectBody?: boolean },
  ): Promise<unknown> {
    const url = `${this.endpoint.baseUrl}${route}`;
    const label = `${method} ${route.split('?')[0]}`;

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers: {
          ...authHeaders(this.endpoint.credentials),
          Connection: 'close',
          ...(opts.body ? { 'Content-Type': 'application/json' } : {}),
        },
        body: opts.body ? JSON.stringify(opts.body) : undefined,
        signal: AbortSignal.timeout(opts.timeoutMs),
      });
      text = (await response.text()).trim();
    } catch (error) {
      if (isTimeoutAbort(error)) {
        log('warn', 'backend_request_timeout', { request: label, timeoutMs: opts.timeoutMs });
        throw new BackendTimeoutError(`请求 OpenCode 超时 (${label}, ${Math.round(opts.timeoutMs / 1000)}s)`, { cause: error });
      }
      const reason = describeFetchError(error);
      log('warn', 'backend_request_failed', { request: label, error: reason });
      throw new NetworkError(`无法连接 OpenCode (${this.endpoint.baseUrl}): ${reason}`, { cause: error });
    }

    const preview = text.slice(0, PREVIEW_LENGTH).replace(/\n/g, ' ');

    if (response.status === 404) {
      throw new NotFoundError(`OpenCode 找不到资源 (${label}, HTTP 404)${preview ? `: ${preview}` : ''}`);
    }
    if (!response.ok) {
      throw new ProtocolError(`OpenCode 返回错误 (${label}, HTTP ${response.status})${preview ? `: ${preview}` : ''}`, response.status);
    }

    if (opts.expectBody === false) return undefined;

    if (!text) {
      throw new ProtocolError(
        `OpenCode 返回空内容 (${label}, HTTP ${response.status})，请确认服务已启动且地址正确: ${this.endpoint.baseUrl}`,
        response.status,
      );
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ProtocolError(
        `OpenCode 返回非 JSON (${label}, HTTP ${response.status})，内容预览: ${preview}。错误: ${String(error)}`,
        response.status,
        { cause: error },
      );
    }
  }
}
