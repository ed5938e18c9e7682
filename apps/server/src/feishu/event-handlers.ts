/**
 * Webhook 与 WebSocket 长连接共用的事件处理
 * 文本消息 → 命令路由 → 回复到原会话；卡片按钮 → 切换当前会话。
 */

import { sendReply, sendTextMessage } from './message.js';
import { handleChatText } from '../bot/router.js';
import { getRelay } from '../services/relay.js';
import {
  parseSwitchSessionAction,
  type FeishuCardActionEvent,
  type FeishuMessageEvent,
  type ParsedFeishuMessage,
} from '../types/feishu-event.js';
import { log } from '../utils/log.js';

/**
 * 解析飞书文本消息，去掉 @ 标记；非文本消息返回 null
 */
export function parseFeishuMessage(event: FeishuMessageEvent): ParsedFeishuMessage | null {
  const { message, sender } = event;

  if (message.message_type !== 'text') {
    log('info', 'feishu_non_text_ignored', { messageType: message.message_type });
    return null;
  }

  let rawText: string;
  try {
    const content: unknown = JSON.parse(message.content || '{}');
    rawText = typeof content === 'object' && content !== null && 'text' in content && typeof content.text === 'string'
      ? content.text
      : '';
  } catch {
    log('warn', 'feishu_content_invalid', { messageId: message.message_id });
    return null;
  }

  const botOpenId = process.env.FEISHU_BOT_OPEN_ID;
  let cleanText = rawText;
  let isBotMentioned = false;

  for (const mention of message.mentions ?? []) {
    cleanText = cleanText.replace(mention.key, '');
    if (botOpenId && mention.id.open_id === botOpenId) {
      isBotMentioned = true;
    }
  }

  return {
    rawText,
    cleanText: cleanText.trim(),
    isBotMentioned,
    chatId: message.chat_id,
    messageId: message.message_id,
    senderOpenId: sender.sender_id?.open_id,
  };
}

function isSenderAllowed(openId: string | undefined): boolean {
  const allowed = getRelay().config.allowedOpenIds;
  if (allowed.length === 0) return true;
  return openId !== undefined && allowed.includes(openId);
}

/**
 * 处理收到的消息。转发给 OpenCode 可能持续数分钟，调用方不应等待它再应答飞书。
 */
export async function handleMessage(event: FeishuMessageEvent): Promise<void> {
  const parsed = parseFeishuMessage(event);
  if (!parsed) return;

  log('info', 'feishu_message_received', {
    text: parsed.cleanText.substring(0, 50),
    messageId: parsed.messageId,
    chatId: parsed.chatId,
    isBotMentioned: parsed.isBotMentioned,
  });

  const botOpenId = process.env.FEISHU_BOT_OPEN_ID;
  if (botOpenId && parsed.senderOpenId === botOpenId) {
    return;
  }

  if (!isSenderAllowed(parsed.senderOpenId)) {
    log('warn', 'feishu_sender_rejected', { senderOpenId: parsed.senderOpenId, chatId: parsed.chatId });
    return;
  }

  if (!parsed.cleanText) {
    return;
  }

  try {
    const reply = await handleChatText(getRelay().orchestrator, parsed.cleanText);
    await sendReply(reply, parsed.chatId);
  } catch (error) {
    log('error', 'feishu_message_handle_failed', { messageId: parsed.messageId, error: String(error) });
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    await sendTextMessage(`❌ 处理失败: ${errorMessage}`, parsed.chatId);
  }
}

/**
 * 处理卡片按钮。返回给长连接的 toast 响应；无法识别的动作返回 null。
 */
export async function handleCardAction(event: FeishuCardActionEvent): Promise<object | null> {
  const action = parseSwitchSessionAction(event.action.value);
  if (!action) {
    log('warn', 'card_action_unrecognized', { value: event.action.value });
    return null;
  }

  if (!isSenderAllowed(event.operator?.open_id)) {
    log('warn', 'card_action_rejected', { operator: event.operator?.open_id });
    return null;
  }

  const chatId = action.chatId || event.context?.open_chat_id;
  const resultText = await getRelay().orchestrator.switchSession(action.sessionId);
  log('info', 'card_action_switch_session', { sessionId: action.sessionId, chatId });

  if (chatId) {
    await sendTextMessage(resultText, chatId);
  }

  return {
    toast: {
      type: resultText.startsWith('✅') ? 'success' : 'error',
      content: resultText,
    },
  };
}
