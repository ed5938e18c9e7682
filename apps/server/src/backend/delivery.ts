/**
 * 消息投递
 *
 * sync：一次 POST /session/:id/message，等待完整响应。
 * async：POST /session/:id/prompt_async，记下此时的消息数，之后每 3 秒轮询消息列表，
 *        避免长任务把一个 HTTP 连接挂十几分钟。
 *
 * 结果统一为 DeliveryOutcome；会话失效（not_found）只上报，不在这里重试。
 */

import { extractFinalResult, type BackendApi } from './client.js';
import { BackendTimeoutError, isBackendError, type BackendErrorKind } from './errors.js';
import { pollUntil, systemClock, type Clock } from '../utils/poll.js';
import { errorMessage, log } from '../utils/log.js';
import type { BackendMessage, DeliveryMode } from '../types/backend.js';

export const ASYNC_POLL_INTERVAL_MS = 3000;
/** 轮询时拉取的消息条数，需大于单轮可能新增的条数 */
export const ASYNC_POLL_MESSAGE_LIMIT = 50;

export type DeliveryOutcome =
  | { ok: true; text: string }
  | { ok: false; kind: BackendErrorKind | 'unexpected'; message: string };

export type DeliveryFailure = Extract<DeliveryOutcome, { ok: false }>;

export interface MessageDeliveryOptions {
  mode: DeliveryMode;
  /** sync 模式的请求超时 / async 模式的总等待时间 */
  timeoutMs: number;
  pollIntervalMs?: number;
  clock?: Clock;
}

interface MessageSnapshot {
  count: number;
  lastId?: string;
}

function snapshot(messages: BackendMessage[]): MessageSnapshot {
  return { count: messages.length, lastId: messages[messages.length - 1]?.info?.id };
}

function hasProgressed(before: MessageSnapshot, after: MessageSnapshot): boolean {
  if (after.count > before.count) return true;
  return after.lastId !== undefined && after.lastId !== before.lastId;
}

function toFailure(error: unknown): DeliveryFailure {
  if (isBackendError(error)) {
    return { ok: false, kind: error.kind, message: error.message };
  }
  return { ok: false, kind: 'unexpected', message: errorMessage(error) };
}

export class MessageDelivery {
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly client: BackendApi,
    private readonly options: MessageDeliveryOptions,
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? ASYNC_POLL_INTERVAL_MS;
    this.clock = options.clock ?? systemClock;
  }

  get mode(): DeliveryMode {
    return this.options.mode;
  }

  async deliver(sessionId: string, text: string): Promise<DeliveryOutcome> {
    const startedAt = this.clock.now();
    try {
      const result = this.options.mode === 'async'
        ? await this.submitAndPoll(sessionId, text, startedAt + this.options.timeoutMs)
        : extractFinalResult(await this.client.sendMessage(sessionId, text));

      log('info', 'delivery_completed', {
        sessionId,
        mode: this.options.mode,
        elapsedMs: this.clock.now() - startedAt,
        resultLength: result.length,
      });
      return { ok: true, text: result };
    } catch (error) {
      const failure = toFailure(error);
      log('warn', 'delivery_failed', {
        sessionId,
        mode: this.options.mode,
        kind: failure.kind,
        error: errorMessage(error),
      });
      return failure;
    }
  }

  private async submitAndPoll(sessionId: string, text: string, deadline: number): Promise<string> {
    await this.client.submitPrompt(sessionId, text);
    // 提交后再取基线，刚存入的 user 消息已在其中
    const before = snapshot(await this.client.getMessages(sessionId, ASYNC_POLL_MESSAGE_LIMIT));
    log('info', 'delivery_submitted', { sessionId, messagesBefore: before.count });

    const outcome = await pollUntil(async () => {
      const messages = await this.client.getMessages(sessionId, ASYNC_POLL_MESSAGE_LIMIT);
      if (!hasProgressed(before, snapshot(messages))) return undefined;

      const newest = messages[messages.length - 1];
      // 兜底：user 消息不是结果；有新消息但没有文本也继续等
      if (!newest || newest.info?.role === 'user') return undefined;
      const result = extractFinalResult(newest);
      return result || undefined;
    }, { intervalMs: this.pollIntervalMs, deadline, clock: this.clock });

    if (outcome.status === 'done') {
      return outcome.value;
    }
    throw new BackendTimeoutError(
      `轮询等待结果超时 (${Math.round(this.options.timeoutMs / 1000)}s, ${outcome.attempts} 次)`,
    );
  }
}
