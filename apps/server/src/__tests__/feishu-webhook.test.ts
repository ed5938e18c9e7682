import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import express from 'express';
import { startStubServer, type StubServer } from './helpers/stub-server.js';

const handlers = vi.hoisted(() => ({
  handleMessage: vi.fn().mockResolvedValue(undefined),
  handleCardAction: vi.fn().mockResolvedValue(null),
}));

vi.mock('../feishu/event-handlers.js', () => handlers);

vi.mock('../utils/log.js', () => ({
  log: vi.fn(),
  errorMessage: (e: unknown) => (e instanceof Error ? e.message : String(e)),
}));

let server: StubServer;
let url: string;

beforeEach(async () => {
  vi.clearAllMocks();
  delete process.env.FEISHU_VERIFICATION_TOKEN;

  // 重新加载以清空去重缓存
  vi.resetModules();
  const { feishuRouter } = await import('../routes/feishu.js');
  const app = express();
  app.use(express.json());
  app.use('/api/feishu', feishuRouter);
  server = await startStubServer(app);
  url = `${server.endpoint.baseUrl}/api/feishu/webhook`;
});

afterEach(async () => {
  await server.close();
  delete process.env.FEISHU_VERIFICATION_TOKEN;
});

function messageEvent(eventId: string, token?: string) {
  return {
    header: { event_id: eventId, event_type: 'im.message.receive_v1', token },
    event: {
      sender: { sender_id: { open_id: 'ou_user' }, sender_type: 'user' },
      message: {
        message_id: 'om_1',
        chat_id: 'oc_chat',
        message_type: 'text',
        content: JSON.stringify({ text: 'hello' }),
      },
    },
  };
}

async function post(body: unknown): Promise<{ status: number; body: unknown }> {
  const res = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  return { status: res.status, body: await res.json() };
}

describe('feishu webhook', () => {
  it('should answer the URL verification challenge', async () => {
    expect(await post({ challenge: 'test-challenge' })).toEqual({
      status: 200,
      body: { challenge: 'test-challenge' },
    });
    expect(handlers.handleMessage).not.toHaveBeenCalled();
  });

  it('should reject a wrong verification token', async () => {
    process.env.FEISHU_VERIFICATION_TOKEN = 'test-token';

    expect(await post(messageEvent('evt_1', 'wrong-token'))).toEqual({
      status: 403,
      body: { error: 'Invalid verification token' },
    });
    expect(handlers.handleMessage).not.toHaveBeenCalled();
  });

  it('should accept the right verification token', async () => {
    process.env.FEISHU_VERIFICATION_TOKEN = 'test-token';

    expect(await post(messageEvent('evt_1', 'test-token'))).toEqual({ status: 200, body: { success: true } });
    expect(handlers.handleMessage).toHaveBeenCalledTimes(1);
  });

  it('should dispatch a message event once per event id', async () => {
    await post(messageEvent('evt_dup'));
    await post(messageEvent('evt_dup'));
    await post(messageEvent('evt_other'));

    expect(handlers.handleMessage).toHaveBeenCalledTimes(2);
    expect(handlers.handleMessage).toHaveBeenCalledWith(expect.objectContaining({
      message: expect.objectContaining({ chat_id: 'oc_chat' }),
    }));
  });

  it('should dispatch card actions', async () => {
    await post({
      header: { event_id: 'evt_card', event_type: 'card.action.trigger' },
      event: {
        operator: { open_id: 'ou_user' },
        action: { value: { action: 'switch_session', sessionId: 'ses_a' } },
      },
    });

    expect(handlers.handleCardAction).toHaveBeenCalledTimes(1);
    expect(handlers.handleMessage).not.toHaveBeenCalled();
  });

  it('should ignore malformed events after acknowledging them', async () => {
    expect(await post({ header: { event_id: 'evt_bad', event_type: 'im.message.receive_v1' }, event: {} })).toEqual({
      status: 200,
      body: { success: true },
    });
    expect(handlers.handleMessage).not.toHaveBeenCalled();
  });
});
