import { describe, it, expect, vi } from 'vitest';
import { HELP_TEXT, handleChatText } from '../bot/router.js';
import type { SessionExport, SessionListing } from '../services/session-orchestrator.js';
import type { SupervisorResult } from '../types/backend.js';

vi.mock('../utils/log.js', () => ({
  log: vi.fn(),
  errorMessage: (e: unknown) => (e instanceof Error ? e.message : String(e)),
}));

function fakeOrchestrator() {
  const state: { current: string | null } = { current: null };
  return {
    state,
    get currentSessionId(): string | null {
      return state.current;
    },
    handleMessage: vi.fn(async (text: string) => `echo: ${text}`),
    newSession: vi.fn(async () => '✅ 已切换到新会话。'),
    listSessions: vi.fn(async (): Promise<SessionListing> => ({ ok: true, sessions: [], currentId: null })),
    newProject: vi.fn(async (_name?: string) => '✅ 已切换到新项目目录并新建会话: /srv/bots/demo'),
    startBackend: vi.fn(async (): Promise<SupervisorResult> => ({ ok: true, message: '已启动 opencode serve (pid=1)' })),
    restartBackend: vi.fn(async (): Promise<SupervisorResult> => ({ ok: true, message: '已重启 OpenCode: ok' })),
    backendStatus: vi.fn(async () => ({ healthy: true, text: 'OpenCode 状态:\n端口: 4096' })),
    exportSession: vi.fn(async (): Promise<SessionExport> => ({ ok: true, filename: 'session_ses_abcd.md', markdown: '# x' })),
  };
}

describe('handleChatText', () => {
  it('answers /start and /help with the help text', async () => {
    const orchestrator = fakeOrchestrator();
    expect(await handleChatText(orchestrator, '/start')).toEqual({ kind: 'text', text: HELP_TEXT });
    expect(await handleChatText(orchestrator, '/help')).toEqual({ kind: 'text', text: HELP_TEXT });
    expect(orchestrator.handleMessage).not.toHaveBeenCalled();
  });

  it('forwards plain text and unknown commands', async () => {
    const orchestrator = fakeOrchestrator();
    expect(await handleChatText(orchestrator, 'fix the build')).toEqual({ kind: 'text', text: 'echo: fix the build' });
    expect(await handleChatText(orchestrator, '/deploy now')).toEqual({ kind: 'text', text: 'echo: /deploy now' });
  });

  it('explains an empty session list', async () => {
    const orchestrator = fakeOrchestrator();
    expect(await handleChatText(orchestrator, '/session')).toEqual({
      kind: 'text',
      text: '当前无会话，发送任意消息将自动创建。',
    });
  });

  it('returns a session list', async () => {
    const orchestrator = fakeOrchestrator();
    orchestrator.listSessions.mockResolvedValue({ ok: true, sessions: [{ id: 'ses_a' }], currentId: 'ses_a' });
    expect(await handleChatText(orchestrator, '/session')).toEqual({
      kind: 'session_list',
      sessions: [{ id: 'ses_a' }],
      currentId: 'ses_a',
    });
  });

  it('passes the /newproj argument through', async () => {
    const orchestrator = fakeOrchestrator();
    await handleChatText(orchestrator, '/newproj demo');
    await handleChatText(orchestrator, '/newproj');
    expect(orchestrator.newProject.mock.calls).toEqual([['demo'], [undefined]]);
  });

  it('/opencode only reports when healthy', async () => {
    const orchestrator = fakeOrchestrator();
    expect(await handleChatText(orchestrator, '/opencode')).toEqual({ kind: 'text', text: 'OpenCode 状态:\n端口: 4096' });
    expect(orchestrator.startBackend).not.toHaveBeenCalled();
  });

  it('/opencode starts the backend when unhealthy', async () => {
    const orchestrator = fakeOrchestrator();
    orchestrator.backendStatus.mockResolvedValue({ healthy: false, text: 'OpenCode 状态:\n健康: 否' });
    expect(await handleChatText(orchestrator, '/opencode')).toEqual({
      kind: 'text',
      text: 'OpenCode 状态:\n健康: 否\n\n✅ 已启动 opencode serve (pid=1)',
    });
  });

  it('/restart shows the resumed session', async () => {
    const orchestrator = fakeOrchestrator();
    orchestrator.state.current = 'ses_0123456789';
    expect(await handleChatText(orchestrator, '/restart')).toEqual({
      kind: 'text',
      text: '✅ 已重启 OpenCode: ok\n当前会话: ses_0123…',
    });
  });

  it('/restart reports failure', async () => {
    const orchestrator = fakeOrchestrator();
    orchestrator.restartBackend.mockResolvedValue({ ok: false, message: 'boom' });
    expect(await handleChatText(orchestrator, '/restart')).toEqual({ kind: 'text', text: '❌ 重启失败: boom' });
  });

  it('/export returns a document', async () => {
    const orchestrator = fakeOrchestrator();
    expect(await handleChatText(orchestrator, '/export')).toEqual({
      kind: 'document',
      filename: 'session_ses_abcd.md',
      markdown: '# x',
    });
  });

  it('/new and /status', async () => {
    const orchestrator = fakeOrchestrator();
    expect(await handleChatText(orchestrator, '/new')).toEqual({ kind: 'text', text: '✅ 已切换到新会话。' });
    expect(await handleChatText(orchestrator, '/status')).toEqual({ kind: 'text', text: 'OpenCode 状态:\n端口: 4096' });
  });
});
