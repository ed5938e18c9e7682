/**
 * Session Orchestrator
 * 维护"当前会话"指针，把聊天消息投递到 opencode，并与后端重启联动。
 *
 * 当前会话只是对后端会话的弱引用：每次使用前都向后端核对，核对失败就清空重新获取。
 * 并发的聊天事件按 last-writer-wins 修改指针，不加锁；
 * 启动/重启等改变进程的操作则在这里串行执行。
 */

import path from 'path';
import type { BackendApi } from '../backend/client.js';
import type { MessageDelivery, DeliveryOutcome } from '../backend/delivery.js';
import type { BackendSupervisor } from '../backend/supervisor.js';
import { isBackendError } from '../backend/errors.js';
import { validateProjectName } from '../bot/text.js';
import { EXPORT_MESSAGE_LIMIT, exportFilename, formatSessionMarkdown } from './session-export.js';
import { errorMessage, log } from '../utils/log.js';
import type { SessionInfo, SupervisorResult } from '../types/backend.js';

export const EMPTY_RESULT_REPLY = '(无文本结果)';
export const TIMEOUT_REPLY =
  '⏰ 请求超时（OpenCode 可能仍在执行），可稍后重试或发 /session 查看。可设置环境变量 OPENCODE_MESSAGE_TIMEOUT（秒）增大超时。';

/** 编排器的全部可变状态 */
export interface SessionContext {
  currentSessionId: string | null;
  /** 上次启动/重启后端使用的目录，/restart 用它恢复 */
  lastWorkingDirectory: string | null;
}

export function createSessionContext(): SessionContext {
  return { currentSessionId: null, lastWorkingDirectory: null };
}

export interface SessionOrchestratorDeps {
  client: BackendApi;
  delivery: Pick<MessageDelivery, 'deliver'>;
  supervisor: Pick<BackendSupervisor, 'ensureRunning' | 'restart' | 'status'>;
  projectsRoot: string;
  defaultCwd: () => string;
}

export type SessionListing =
  | { ok: true; sessions: SessionInfo[]; currentId: string | null }
  | { ok: false; message: string };

export type SessionExport =
  | { ok: true; filename: string; markdown: string }
  | { ok: false; message: string };

/**
 * 有活动时间的排在前面，时间越新越靠前；都没有时保持后端顺序
 */
export function sortByRecentActivity(sessions: SessionInfo[]): SessionInfo[] {
  return [...sessions].sort((a, b) => {
    if (a.lastActivity === undefined && b.lastActivity === undefined) return 0;
    if (a.lastActivity === undefined) return 1;
    if (b.lastActivity === undefined) return -1;
    return b.lastActivity - a.lastActivity;
  });
}

export class SessionOrchestrator {
  private lifecycle: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly deps: SessionOrchestratorDeps,
    readonly context: SessionContext = createSessionContext(),
  ) {}

  get currentSessionId(): string | null {
    return this.context.currentSessionId;
  }

  /**
   * 缓存的会话仍在后端列表中则复用；否则取后端列表第一个，列表为空则新建。
   */
  async getOrCreateSession(): Promise<string> {
    const cached = this.context.currentSessionId;
    if (cached) {
      try {
        const sessions = await this.deps.client.listSessions();
        if (sessions.some(s => s.id === cached)) {
          return cached;
        }
        log('info', 'session_cache_stale', { sessionId: cached });
      } catch (error) {
        log('warn', 'session_verify_failed', { sessionId: cached, error: errorMessage(error) });
      }
      this.context.currentSessionId = null;
    }

    const sessions = await this.deps.client.listSessions();
    if (sessions.length === 0) {
      const created = await this.deps.client.createSession();
      this.context.currentSessionId = created.id;
      log('info', 'session_created', { sessionId: created.id });
      return created.id;
    }

    this.context.currentSessionId = sessions[0].id;
    return sessions[0].id;
  }

  /**
   * 转发一条聊天消息，返回要回复给用户的文本。
   * 会话失效时清空指针并用新会话重试一次；其余失败（包括超时）不重试。
   */
  async handleMessage(text: string): Promise<string> {
    let outcome: DeliveryOutcome;
    try {
      const sessionId = await this.getOrCreateSession();
      outcome = await this.deps.delivery.deliver(sessionId, text);

      if (!outcome.ok && outcome.kind === 'not_found') {
        log('warn', 'session_rejected_retrying', { sessionId });
        this.context.currentSessionId = null;
        const freshId = await this.getOrCreateSession();
        outcome = await this.deps.delivery.deliver(freshId, text);
      }
    } catch (error) {
      // 列出/创建会话超时同样可能仍在后端执行
      if (isBackendError(error) && error.kind === 'timeout') {
        return TIMEOUT_REPLY;
      }
      return `❌ 调用 OpenCode 失败: ${errorMessage(error)}`;
    }

    if (outcome.ok) {
      return outcome.text || EMPTY_RESULT_REPLY;
    }
    if (outcome.kind === 'timeout') {
      return TIMEOUT_REPLY;
    }
    return `❌ 调用 OpenCode 失败: ${outcome.message}`;
  }

  async newSession(): Promise<string> {
    try {
      const session = await this.deps.client.createSession();
      this.context.currentSessionId = session.id;
      log('info', 'session_created', { sessionId: session.id });
      return '✅ 已切换到新会话。';
    } catch (error) {
      return `❌ 创建会话失败: ${errorMessage(error)}`;
    }
  }

  async listSessions(): Promise<SessionListing> {
    try {
      const sessions = await this.deps.client.listSessions();
      return { ok: true, sessions, currentId: this.context.currentSessionId };
    } catch (error) {
      return { ok: false, message: `❌ 获取会话失败: ${errorMessage(error)}` };
    }
  }

  async switchSession(sessionId: string): Promise<string> {
    try {
      const sessions = await this.deps.client.listSessions();
      const target = sessions.find(s => s.id === sessionId);
      if (!target) {
        return '⚠️ 会话不存在或已被删除，发送 /session 重新查看。';
      }
      this.context.currentSessionId = sessionId;
      return `✅ 已切换到会话: ${target.title || '(无标题)'}`;
    } catch (error) {
      return `❌ 切换失败: ${errorMessage(error)}`;
    }
  }

  /**
   * 不带参数：在日期目录重启后端；带参数：在 <projectsRoot>/<name> 重启。随后新建会话。
   */
  async newProject(name?: string): Promise<string> {
    let cwd: string;
    if (name !== undefined) {
      const trimmed = name.trim();
      const invalid = validateProjectName(trimmed);
      if (invalid) return `⚠️ ${invalid}`;
      cwd = path.join(this.deps.projectsRoot, trimmed);
    } else {
      cwd = this.deps.defaultCwd();
    }

    // 换目录后旧会话一律作废，不论重启是否成功
    this.context.currentSessionId = null;
    const result = await this.serialize(() => this.deps.supervisor.restart(cwd));
    if (!result.ok) {
      return `❌ 重启 OpenCode 失败: ${result.message}`;
    }

    this.context.lastWorkingDirectory = cwd;
    try {
      const session = await this.deps.client.createSession();
      this.context.currentSessionId = session.id;
      return `✅ 已切换到新项目目录并新建会话: ${cwd}`;
    } catch (error) {
      return `❌ 创建会话失败: ${errorMessage(error)}`;
    }
  }

  async startBackend(): Promise<SupervisorResult> {
    const cwd = this.context.lastWorkingDirectory ?? this.deps.defaultCwd();
    const result = await this.serialize(() => this.deps.supervisor.ensureRunning(cwd));
    if (result.ok && this.context.lastWorkingDirectory === null) {
      this.context.lastWorkingDirectory = cwd;
    }
    return result;
  }

  /**
   * 在上次的目录重启后端，并把当前会话设为该目录下最近活动的会话。
   */
  async restartBackend(): Promise<SupervisorResult> {
    const cwd = this.context.lastWorkingDirectory ?? this.deps.defaultCwd();
    this.context.lastWorkingDirectory = cwd;

    this.context.currentSessionId = null;
    const result = await this.serialize(() => this.deps.supervisor.restart(cwd));
    if (!result.ok) return result;

    try {
      const [recent] = sortByRecentActivity(await this.deps.client.listSessions());
      if (recent) {
        this.context.currentSessionId = recent.id;
        log('info', 'session_resumed', { sessionId: recent.id, cwd });
      }
    } catch (error) {
      // 会话留空，下一条消息会走 getOrCreateSession
      log('warn', 'session_resume_failed', { cwd, error: errorMessage(error) });
    }
    return result;
  }

  /** 每次都重新探测，text 为展示用的多行说明 */
  async backendStatus(): Promise<{ healthy: boolean; text: string }> {
    const status = await this.deps.supervisor.status();
    const lines = [
      `端口: ${status.port}`,
      `占用: ${status.occupied ? '是' : '否'}`,
      `健康: ${status.healthy ? '是' : '否'}`,
    ];
    if (status.pid !== undefined) lines.push(`进程: pid=${status.pid}`);
    if (status.command) lines.push(`命令: ${status.command}`);
    if (this.context.lastWorkingDirectory) lines.push(`目录: ${this.context.lastWorkingDirectory}`);
    return { healthy: status.healthy, text: `OpenCode 状态:\n${lines.join('\n')}` };
  }

  async exportSession(): Promise<SessionExport> {
    try {
      const sessionId = await this.getOrCreateSession();
      const messages = await this.deps.client.getMessages(sessionId, EXPORT_MESSAGE_LIMIT);
      return {
        ok: true,
        filename: exportFilename(sessionId),
        markdown: formatSessionMarkdown(messages),
      };
    } catch (error) {
      return { ok: false, message: `❌ 导出失败: ${errorMessage(error)}` };
    }
  }

  /** 同一端口上的启动/重启不可交错 */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lifecycle.then(task);
    this.lifecycle = run.catch(() => undefined);
    return run;
  }
}
