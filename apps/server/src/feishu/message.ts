import { feishuClient } from './client.js';
import { chunkText } from '../bot/text.js';
import type { BotReply } from '../bot/router.js';
import type { SessionInfo } from '../types/backend.js';
import { log } from '../utils/log.js';

export type CardType = 'session_list' | 'notice';

/** 会话列表最多展示的按钮数 */
const MAX_SESSION_BUTTONS = 10;

interface SessionButton {
  label: string;
  value: string;
  primary?: boolean;
}

export interface SendCardOptions {
  type: CardType;
  title: string;
  content?: string;
  chatId: string;
  sessionButtons?: SessionButton[];
  /** 卡片底部灰色备注 */
  note?: string;
}

export interface SendCardResult {
  messageId: string;
  chatId: string;
}

/**
 * 向群/单聊发送纯文本
 */
export async function sendTextMessage(text: string, chatId: string): Promise<void> {
  try {
    const response = await feishuClient.im.message.create({
      params: {
        receive_id_type: 'chat_id',
      },
      data: {
        receive_id: chatId,
        msg_type: 'text',
        content: JSON.stringify({ text }),
      },
    });

    if (response.code !== 0) {
      throw new Error(`Feishu API error ${response.code}: ${response.msg}`);
    }

    log('info', 'text_message_sent', { chatId, text: text.substring(0, 50) });
  } catch (error) {
    log('error', 'text_message_send_failed', { chatId, error: String(error) });
    throw error;
  }
}

/**
 * 发送交互卡片，返回消息 ID
 */
export async function sendCardMessage(options: SendCardOptions): Promise<SendCardResult> {
  const card = buildCard(options);

  try {
    const response = await feishuClient.im.message.create({
      params: {
        receive_id_type: 'chat_id',
      },
      data: {
        receive_id: options.chatId,
        msg_type: 'interactive',
        content: JSON.stringify(card),
      },
    });

    if (response.code !== 0) {
      throw new Error(`Feishu API error ${response.code}: ${response.msg}`);
    }

    const messageId = response.data?.message_id || '';
    log('info', 'card_message_sent', { title: options.title, messageId, chatId: options.chatId });

    return { messageId, chatId: options.chatId };
  } catch (error) {
    log('error', 'feishu_card_send_failed', { title: options.title, error: String(error) });
    throw error;
  }
}

export function buildCard(options: SendCardOptions): object {
  const { type, title, content, sessionButtons, note } = options;

  const headerColor: Record<CardType, string> = {
    session_list: 'purple',
    notice: 'blue',
  };

  const elements: object[] = [];

  if (content) {
    elements.push({
      tag: 'div',
      text: {
        tag: 'lark_md',
        content,
      },
    });
  }

  if (sessionButtons && sessionButtons.length > 0) {
    elements.push({
      tag: 'action',
      actions: sessionButtons.map(btn => ({
        tag: 'button',
        text: {
          tag: 'plain_text',
          content: btn.label,
        },
        type: btn.primary ? 'primary' : 'default',
        value: btn.value,
      })),
    });
  }

  if (note) {
    elements.push({ tag: 'hr' });
    elements.push({
      tag: 'note',
      elements: [
        {
          tag: 'plain_text',
          content: note,
        },
      ],
    });
  }

  return {
    config: {
      wide_screen_mode: true,
    },
    header: {
      title: {
        tag: 'plain_text',
        content: title,
      },
      template: headerColor[type],
    },
    elements,
  };
}

/**
 * 会话列表卡片：每个会话一个切换按钮，当前会话高亮
 */
export function buildSessionListCard(
  sessions: SessionInfo[],
  currentId: string | null,
  chatId: string,
): SendCardOptions {
  const lines = sessions.map(s => {
    const mark = s.id === currentId ? ' **[当前]**' : '';
    return `• ${s.id.substring(0, 8)}… ${s.title || '(无标题)'}${mark}`;
  });

  const sessionButtons = sessions.slice(0, MAX_SESSION_BUTTONS).map(s => ({
    label: `${s.id === currentId ? '✅ ' : ''}${(s.title || s.id.substring(0, 8)).substring(0, 20)}`,
    value: JSON.stringify({ action: 'switch_session', sessionId: s.id, chatId }),
    primary: s.id === currentId,
  }));

  return {
    type: 'session_list',
    title: '📋 会话列表',
    content: lines.join('\n'),
    chatId,
    sessionButtons,
    note: '点击按钮切换当前会话',
  };
}

/**
 * 把路由结果发回聊天；长文本按长度分段
 */
export async function sendReply(reply: BotReply, chatId: string): Promise<void> {
  switch (reply.kind) {
    case 'text':
      for (const chunk of chunkText(reply.text)) {
        await sendTextMessage(chunk, chatId);
      }
      return;

    case 'session_list':
      await sendCardMessage(buildSessionListCard(reply.sessions, reply.currentId, chatId));
      return;

    case 'document':
      await sendTextMessage(`📄 ${reply.filename}`, chatId);
      for (const chunk of chunkText(reply.markdown)) {
        await sendTextMessage(chunk, chatId);
      }
      return;
  }
}
