import { Router } from 'express';
import { handleCardAction, handleMessage } from '../feishu/event-handlers.js';
import { isFeishuCardActionEvent, isFeishuMessageEvent } from '../types/feishu-event.js';
import { log } from '../utils/log.js';

export const feishuRouter = Router();

/** 事件去重 Set（飞书可能重复推送） */
const processedEvents = new Set<string>();
const MAX_EVENT_CACHE = 1000;

function markProcessed(eventId: string): boolean {
  if (processedEvents.has(eventId)) return false;
  processedEvents.add(eventId);

  // 防止内存泄漏
  if (processedEvents.size > MAX_EVENT_CACHE) {
    const oldest = processedEvents.values().next();
    if (!oldest.done) processedEvents.delete(oldest.value);
  }
  return true;
}

/**
 * POST /api/feishu/webhook
 * 飞书事件回调（消息、卡片按钮）。先立即应答（飞书有 3 秒超时），再异步处理。
 */
feishuRouter.post('/webhook', async (req, res) => {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null) {
    res.status(400).json({ error: 'Invalid body' });
    return;
  }

  // Feishu URL verification challenge
  if ('challenge' in body && typeof body.challenge === 'string') {
    log('info', 'feishu_url_verification', {});
    res.json({ challenge: body.challenge });
    return;
  }

  const header: object = 'header' in body && typeof body.header === 'object' && body.header !== null
    ? body.header
    : {};
  const token = 'token' in header ? header.token : undefined;
  const eventId = 'event_id' in header && typeof header.event_id === 'string' ? header.event_id : undefined;
  const eventType = 'event_type' in header ? header.event_type : undefined;
  const event = 'event' in body ? body.event : undefined;

  const verificationToken = process.env.FEISHU_VERIFICATION_TOKEN;
  if (verificationToken && token !== verificationToken) {
    log('warn', 'feishu_token_invalid', {});
    res.status(403).json({ error: 'Invalid verification token' });
    return;
  }

  if (eventId && !markProcessed(eventId)) {
    log('info', 'feishu_event_duplicate', { eventId });
    res.json({ success: true });
    return;
  }

  res.json({ success: true });

  log('info', 'feishu_event_received', { eventType });

  try {
    switch (eventType) {
      case 'im.message.receive_v1':
        if (isFeishuMessageEvent(event)) await handleMessage(event);
        break;
      case 'card.action.trigger':
        if (isFeishuCardActionEvent(event)) await handleCardAction(event);
        break;
      default:
        log('info', 'feishu_event_unhandled', { eventType });
    }
  } catch (error) {
    log('error', 'feishu_event_failed', { eventType, error: String(error) });
  }
});
