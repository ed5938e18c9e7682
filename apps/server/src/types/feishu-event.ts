/** 飞书消息事件结构（只声明用到的字段） */
export interface FeishuMessageEvent {
  sender: {
    sender_id?: { open_id?: string };
    sender_type?: string;
  };
  message: {
    message_id: string;
    parent_id?: string;
    chat_id: string;
    chat_type?: string;
    message_type: string;
    content: string;
    mentions?: Array<{
      key: string;
      id: { open_id?: string };
      name: string;
    }>;
  };
}

/** 飞书卡片动作事件 */
export interface FeishuCardActionEvent {
  operator?: {
    open_id?: string;
  };
  action: {
    value: unknown;
    tag?: string;
  };
  context?: {
    open_message_id?: string;
    open_chat_id?: string;
  };
}

/** 会话列表卡片按钮携带的数据 */
export interface SwitchSessionAction {
  action: 'switch_session';
  sessionId: string;
  chatId?: string;
}

/** 解析后的飞书消息 */
export interface ParsedFeishuMessage {
  rawText: string;
  cleanText: string;
  isBotMentioned: boolean;
  chatId: string;
  messageId: string;
  senderOpenId?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isFeishuMessageEvent(value: unknown): value is FeishuMessageEvent {
  if (!isRecord(value) || !isRecord(value.sender) || !isRecord(value.message)) return false;
  const { message } = value;
  return typeof message.message_id === 'string'
    && typeof message.chat_id === 'string'
    && typeof message.message_type === 'string'
    && typeof message.content === 'string';
}

export function isFeishuCardActionEvent(value: unknown): value is FeishuCardActionEvent {
  return isRecord(value) && isRecord(value.action) && 'value' in value.action;
}

/**
 * 按钮 value 可能是 JSON 字符串，也可能已经是对象
 */
export function parseSwitchSessionAction(raw: unknown): SwitchSessionAction | null {
  let value: unknown = raw;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch {
      return null;
    }
  }
  if (!isRecord(value) || value.action !== 'switch_session' || typeof value.sessionId !== 'string') {
    return null;
  }
  return {
    action: 'switch_session',
    sessionId: value.sessionId,
    chatId: typeof value.chatId === 'string' ? value.chatId : undefined,
  };
}
