/**
 * 聊天命令路由
 * 与平台无关：输入一段文本，输出要回复的内容，由 feishu 层负责真正发送。
 */

import { parseCommand } from './text.js';
import type { SessionOrchestrator } from '../services/session-orchestrator.js';
import type { SessionInfo } from '../types/backend.js';
import { log } from '../utils/log.js';

export type BotReply =
  | { kind: 'text'; text: string }
  | { kind: 'session_list'; sessions: SessionInfo[]; currentId: string | null }
  | { kind: 'document'; filename: string; markdown: string };

export const HELP_TEXT = [
  '直接发消息即会转发给 OpenCode 执行，仅回复最终结果。',
  '/session 查看并切换会话',
  '/new 新建会话',
  '/newproj [目录名] 新建项目目录并重启 OpenCode',
  '/opencode 查看状态，未运行时自动启动',
  '/restart 在上次的目录重启 OpenCode 并恢复最近会话',
  '/export 导出当前会话为 Markdown',
].join('\n');

const text = (value: string): BotReply => ({ kind: 'text', text: value });

type Orchestrator = Pick<
  SessionOrchestrator,
  | 'handleMessage'
  | 'newSession'
  | 'listSessions'
  | 'newProject'
  | 'startBackend'
  | 'restartBackend'
  | 'backendStatus'
  | 'exportSession'
  | 'currentSessionId'
>;

export async function handleChatText(orchestrator: Orchestrator, input: string): Promise<BotReply> {
  const command = parseCommand(input);
  if (command) {
    log('info', 'chat_command', { command: command.name, hasArg: command.arg !== undefined });
  }

  switch (command?.name) {
    case 'start':
    case 'help':
      return text(HELP_TEXT);

    case 'session': {
      const listing = await orchestrator.listSessions();
      if (!listing.ok) return text(listing.message);
      if (listing.sessions.length === 0) {
        return text('当前无会话，发送任意消息将自动创建。');
      }
      return { kind: 'session_list', sessions: listing.sessions, currentId: listing.currentId };
    }

    case 'new':
      return text(await orchestrator.newSession());

    case 'newproj':
      return text(await orchestrator.newProject(command?.arg));

    case 'opencode': {
      const status = await orchestrator.backendStatus();
      if (status.healthy) return text(status.text);
      const started = await orchestrator.startBackend();
      return text(`${status.text}\n\n${started.ok ? '✅' : '❌'} ${started.message}`);
    }

    case 'status':
      return text((await orchestrator.backendStatus()).text);

    case 'restart': {
      const result = await orchestrator.restartBackend();
      if (!result.ok) return text(`❌ 重启失败: ${result.message}`);
      const current = orchestrator.currentSessionId;
      return text(`✅ ${result.message}${current ? `\n当前会话: ${current.substring(0, 8)}…` : ''}`);
    }

    case 'export': {
      const exported = await orchestrator.exportSession();
      if (!exported.ok) return text(exported.message);
      return { kind: 'document', filename: exported.filename, markdown: exported.markdown };
    }

    default:
      // 普通消息和未知命令都转发给 OpenCode
      return text(await orchestrator.handleMessage(input));
  }
}
