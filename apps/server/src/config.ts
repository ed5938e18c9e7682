/**
 * 环境变量 → RelayConfig
 *
 * 只在启动时读取一次；各服务通过构造参数拿到配置，不再直接读 process.env。
 */

import os from 'os';
import path from 'path';
import type { BackendEndpoint, DeliveryMode } from './types/backend.js';

export const DEFAULT_BASE_URL = 'http://127.0.0.1:4096';
export const DEFAULT_BACKEND_PORT = 4096;
export const DEFAULT_MESSAGE_TIMEOUT_SECONDS = 600;
export const MIN_MESSAGE_TIMEOUT_SECONDS = 60;

export interface RelayConfig {
  endpoint: BackendEndpoint;
  messageTimeoutMs: number;
  deliveryMode: DeliveryMode;
  /** OPENCODE_CWD，未设置时按日期目录 */
  cwdOverride?: string;
  projectsRoot: string;
  /** opencode serve 的 stdout/stderr 追加写入位置 */
  backendLogPath: string;
  port: number;
  useLongConnection: boolean;
  allowedOpenIds: string[];
}

type Env = Record<string, string | undefined>;

export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function parseEndpoint(env: Env): BackendEndpoint {
  const baseUrl = (env.OPENCODE_BASE_URL || DEFAULT_BASE_URL).trim();
  let host = '127.0.0.1';
  let port = DEFAULT_BACKEND_PORT;
  try {
    const url = new URL(baseUrl);
    host = url.hostname || host;
    // 未显式写端口时沿用 opencode 默认端口，而不是 80/443
    if (url.port) port = parseInt(url.port, 10);
  } catch {
    // 非法 URL：保留默认 host/port，请求时再由 fetch 报错
  }

  const password = env.OPENCODE_SERVER_PASSWORD || '';
  return {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    host,
    port,
    credentials: password
      ? { username: env.OPENCODE_SERVER_USERNAME || 'opencode', password }
      : undefined,
  };
}

export function parseMessageTimeoutMs(raw: string | undefined): number {
  const seconds = raw ? Number(raw.trim()) : NaN;
  if (!raw || !raw.trim() || !Number.isFinite(seconds)) {
    return DEFAULT_MESSAGE_TIMEOUT_SECONDS * 1000;
  }
  return Math.max(MIN_MESSAGE_TIMEOUT_SECONDS, seconds) * 1000;
}

export function isTruthyFlag(raw: string | undefined): boolean {
  return ['1', 'true', 'yes'].includes((raw || '').trim().toLowerCase());
}

export function loadConfig(env: Env = process.env): RelayConfig {
  const cwdOverride = (env.OPENCODE_CWD || '').trim();
  return {
    endpoint: parseEndpoint(env),
    messageTimeoutMs: parseMessageTimeoutMs(env.OPENCODE_MESSAGE_TIMEOUT),
    deliveryMode: isTruthyFlag(env.OPENCODE_USE_ASYNC) ? 'async' : 'sync',
    cwdOverride: cwdOverride ? path.resolve(expandHome(cwdOverride)) : undefined,
    projectsRoot: path.resolve(expandHome(env.PROJECTS_ROOT || '~/bots')),
    backendLogPath: path.resolve(expandHome(env.OPENCODE_LOG_PATH || 'opencode.log')),
    port: parseInt(env.PORT || '3000', 10),
    useLongConnection: env.FEISHU_USE_LONG_CONNECTION === 'true',
    allowedOpenIds: (env.FEISHU_ALLOWED_OPEN_IDS || '')
      .split(',')
      .map(id => id.trim())
      .filter(Boolean),
  };
}

function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * 默认工作目录：OPENCODE_CWD，或 <PROJECTS_ROOT>/年-月-日
 */
export function defaultWorkingDirectory(config: RelayConfig, today: Date = new Date()): string {
  return config.cwdOverride ?? path.join(config.projectsRoot, formatDate(today));
}
