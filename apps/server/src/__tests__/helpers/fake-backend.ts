import { vi } from 'vitest';
import type { BackendApi } from '../../backend/client.js';
import type { BackendMessage, HealthStatus, SessionInfo } from '../../types/backend.js';

/** 内存里的 opencode：会话列表可直接改，消息相关方法由各测试自行设定 */
export function createFakeBackend(initial: SessionInfo[] = []) {
  const sessions: SessionInfo[] = [...initial];
  let created = 0;

  const api = {
    health: vi.fn(async (): Promise<HealthStatus> => ({ healthy: true })),
    listSessions: vi.fn(async (): Promise<SessionInfo[]> => [...sessions]),
    createSession: vi.fn(async (title?: string): Promise<SessionInfo> => {
      created += 1;
      const session: SessionInfo = { id: `ses_new_${created}`, title };
      sessions.unshift(session);
      return session;
    }),
    getMessages: vi.fn(async (_sessionId: string, _limit: number): Promise<BackendMessage[]> => []),
    sendMessage: vi.fn(async (_sessionId: string, _text: string): Promise<BackendMessage> => ({ parts: [] })),
    submitPrompt: vi.fn(async (_sessionId: string, _text: string): Promise<void> => undefined),
  } satisfies BackendApi;

  return { api, sessions };
}
