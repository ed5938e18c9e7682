/**
 * 有界轮询
 * Supervisor 的健康检查轮询和异步投递的结果轮询共用这一份循环。
 */

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
};

export interface PollOptions {
  intervalMs: number;
  /** 最多尝试次数，不传则只受 deadline 限制 */
  maxAttempts?: number;
  /** 绝对时间点（clock.now() 同一时基） */
  deadline?: number;
  clock?: Clock;
}

export type PollOutcome<T> =
  | { status: 'done'; value: T; attempts: number }
  | { status: 'exhausted'; attempts: number };

/**
 * 每轮先等待 intervalMs 再调用 check；check 返回非 undefined 即结束。
 * check 抛出的异常原样向上抛。
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<T | undefined>,
  options: PollOptions,
): Promise<PollOutcome<T>> {
  const { intervalMs, maxAttempts, deadline } = options;
  const clock = options.clock ?? systemClock;

  if (maxAttempts === undefined && deadline === undefined) {
    throw new Error('pollUntil requires maxAttempts or deadline');
  }

  let attempts = 0;
  while (true) {
    if (maxAttempts !== undefined && attempts >= maxAttempts) break;
    if (deadline !== undefined && clock.now() >= deadline) break;

    await clock.sleep(intervalMs);
    attempts++;

    const value = await check(attempts);
    if (value !== undefined) {
      return { status: 'done', value, attempts };
    }
  }

  return { status: 'exhausted', attempts };
}
