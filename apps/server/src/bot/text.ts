/**
 * 聊天文本辅助：命令识别、分段、项目目录名校验
 */

export const MAX_MESSAGE_LENGTH = 4000;
const MAX_PROJECT_NAME_LENGTH = 64;

export interface ParsedCommand {
  name: string;
  arg?: string;
}

/** 去掉开头的空白和不可见字符，用于判断首个可见字符是否为 / */
export function stripLeadingInvisible(text: string): string {
  return text.replace(/^[\s\p{C}]+/u, '');
}

/**
 * "/newproj demo" → { name: 'newproj', arg: 'demo' }；"/session@bot" → { name: 'session' }
 * 不是命令时返回 null
 */
export function parseCommand(text: string): ParsedCommand | null {
  const visible = stripLeadingInvisible(text);
  if (!visible.startsWith('/')) return null;

  const match = visible.match(/^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/);
  if (!match) return null;

  const arg = match[2]?.trim();
  return { name: match[1].toLowerCase(), arg: arg ? arg : undefined };
}

export function chunkText(text: string, size: number = MAX_MESSAGE_LENGTH): string[] {
  if (!text) return [];
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

/**
 * 校验 /newproj 的子目录名；通过返回 null，否则返回错误说明
 */
export function validateProjectName(name: string): string | null {
  if (!name || name.length > MAX_PROJECT_NAME_LENGTH) {
    return `子目录名长度须 1～${MAX_PROJECT_NAME_LENGTH}`;
  }
  for (const ch of name) {
    const code = ch.codePointAt(0) ?? 0;
    if ('/\\\0\t\n\r'.includes(ch) || code < 32 || code === 127) {
      return '子目录名不可含不可见字符或路径符号';
    }
  }
  if (name.startsWith('.') || name.includes('..')) {
    return '子目录名不可含 .. 或以 . 开头';
  }
  return null;
}
