/**
 * 端口占用探测
 * 先做一次短超时 TCP 连接判断是否占用，再按顺序尝试 lsof / fuser / ss 找出占用进程。
 * 任何一步失败都只会让结果变成"占用，进程未知"，不会抛错。
 */

import net from 'net';
import { execFile } from 'child_process';
import { readFile } from 'fs/promises';
import { log } from '../utils/log.js';

const CONNECT_TIMEOUT_MS = 1000;
const TOOL_TIMEOUT_MS = 2000;
const COMMAND_PREVIEW_LENGTH = 80;

export interface PortProbe {
  occupied: boolean;
  pid?: number;
  /** 命令行预览，仅用于展示 */
  command?: string;
}

/** 按端口查找占用进程 pid 的一种方式 */
export interface ProcessLocator {
  name: string;
  locate(port: number): Promise<number | undefined>;
}

/** 运行外部工具，失败（不存在、超时、非 0 退出）一律返回 undefined */
export function runTool(
  file: string,
  args: string[],
  timeoutMs: number = TOOL_TIMEOUT_MS,
): Promise<{ stdout: string; stderr: string } | undefined> {
  return new Promise(resolve => {
    execFile(file, args, { timeout: timeoutMs, encoding: 'utf-8' }, (error, stdout, stderr) => {
      if (error) {
        resolve(undefined);
        return;
      }
      resolve({ stdout, stderr });
    });
  });
}

/**
 * 输出中第一个不是本进程的 pid。
 * 本进程可能作为客户端连着该端口，绝不能把自己当成占用者。
 */
export function firstPid(text: string, selfPid: number = process.pid): number | undefined {
  for (const token of text.trim().split(/\s+/)) {
    const pid = parseInt(token, 10);
    if (Number.isInteger(pid) && pid > 0 && pid !== selfPid) return pid;
  }
  return undefined;
}

export const lsofLocator: ProcessLocator = {
  name: 'lsof',
  async locate(port) {
    // 只看 LISTEN 的 socket，排除连到该端口的客户端
    const out = await runTool('lsof', ['-nP', `-iTCP:${port}`, '-sTCP:LISTEN', '-t']);
    return out ? firstPid(out.stdout) : undefined;
  },
};

export const fuserLocator: ProcessLocator = {
  name: 'fuser',
  async locate(port) {
    const out = await runTool('fuser', [`${port}/tcp`]);
    if (!out) return undefined;
    // fuser 把 pid 写 stdout、把 "4096/tcp:" 写 stderr
    return firstPid(out.stdout) ?? firstPid(out.stderr.replace(/^\S*:/, ''));
  },
};

export function parseSsOutput(output: string, port: number): number | undefined {
  for (const line of output.split('\n')) {
    if (!line.includes(`:${port} `) && !line.endsWith(`:${port}`)) continue;
    for (const match of line.matchAll(/pid=(\d+)/g)) {
      const pid = parseInt(match[1], 10);
      if (pid !== process.pid) return pid;
    }
  }
  return undefined;
}

export const ssLocator: ProcessLocator = {
  name: 'ss',
  async locate(port) {
    const out = await runTool('ss', ['-tlnp']);
    return out ? parseSsOutput(out.stdout, port) : undefined;
  },
};

export const defaultLocators: ProcessLocator[] = [lsofLocator, fuserLocator, ssLocator];

/** /proc/<pid>/cmdline 的截断预览 */
export async function readProcessCommand(pid: number): Promise<string | undefined> {
  try {
    const raw = await readFile(`/proc/${pid}/cmdline`, 'utf-8');
    const command = raw.replace(/\0/g, ' ').trim().slice(0, COMMAND_PREVIEW_LENGTH);
    return command || undefined;
  } catch {
    return undefined;
  }
}

export function canConnect(host: string, port: number, timeoutMs: number = CONNECT_TIMEOUT_MS): Promise<boolean> {
  return new Promise(resolve => {
    const socket = net.createConnection({ host, port });
    const finish = (result: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(result);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });
}

export interface PortProberOptions {
  host?: string;
  locators?: ProcessLocator[];
  readCommand?: (pid: number) => Promise<string | undefined>;
  connectTimeoutMs?: number;
}

export class PortProber {
  private readonly host: string;
  private readonly locators: ProcessLocator[];
  private readonly readCommand: (pid: number) => Promise<string | undefined>;
  private readonly connectTimeoutMs: number;

  constructor(options: PortProberOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.locators = options.locators ?? defaultLocators;
    this.readCommand = options.readCommand ?? readProcessCommand;
    this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
  }

  async probe(port: number): Promise<PortProbe> {
    const occupied = await canConnect(this.host, port, this.connectTimeoutMs);
    if (!occupied) {
      return { occupied: false };
    }

    const pid = await this.locateOwner(port);
    if (pid === undefined) {
      log('debug', 'port_owner_unknown', { port });
      return { occupied: true };
    }

    return { occupied: true, pid, command: await this.readCommand(pid) };
  }

  private async locateOwner(port: number): Promise<number | undefined> {
    for (const locator of this.locators) {
      try {
        const pid = await locator.locate(port);
        if (pid === process.pid) {
          log('debug', 'port_owner_is_self', { port, locator: locator.name });
          continue;
        }
        if (pid !== undefined) {
          log('debug', 'port_owner_located', { port, pid, locator: locator.name });
          return pid;
        }
      } catch (error) {
        log('debug', 'port_locator_failed', { port, locator: locator.name, error: String(error) });
      }
    }
    return undefined;
  }
}
