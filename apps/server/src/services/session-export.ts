/**
 * 会话消息导出为 Markdown
 */

import type { BackendMessage } from '../types/backend.js';

export const EXPORT_MESSAGE_LIMIT = 500;

export function formatSessionMarkdown(messages: BackendMessage[]): string {
  const blocks: string[] = [];
  messages.forEach((message, index) => {
    blocks.push(`## Message ${index + 1}\n`);
    for (const part of message.parts) {
      if (part.type !== 'text') continue;
      const text = (part.text || '').trim();
      if (text) {
        blocks.push(text);
        blocks.push('');
      }
    }
    blocks.push('');
  });
  return blocks.join('\n').trim() || '(无内容)';
}

export function exportFilename(sessionId: string): string {
  return `session_${sessionId.substring(0, 8)}.md`;
}
