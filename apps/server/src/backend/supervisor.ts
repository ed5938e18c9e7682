/**
 * Backend Supervisor
 * 负责 opencode serve 进程的探测、启动、终止与重启。
 *
 * 公共方法一律返回 { ok, message }，内部异常在此边界转换成说明文字；
 * 同一端口上的 start / restart 不可交错执行，由调用方串行化。
 */

import fs from 'fs';
import { mkdir } from 'fs/promises';
import path from 'path';
import { spawn } from 'child_process';
import { isBackendHealthy } from './health.js';
import { PortProber, type PortProbe } from './port-prober.js';
import { PortConflictError, ProcessError } from './errors.js';
import { pollUntil, systemClock, type Clock } from '../utils/poll.js';
import { errorMessage, log } from '../utils/log.js';
import type {
  BackendEndpoint,
  BackendStatus,
  ProcessHandle,
  SupervisorResult,
  SupervisorState,
} from '../types/backend.js';

export const BACKEND_COMMAND: readonly string[] = ['opencode', 'serve'];

const START_HEALTH_ATTEMPTS = 10;
const RESTART_HEALTH_ATTEMPTS = 15;
const HEALTH_POLL_INTERVAL_MS = 1000;
const TERMINATE_POLL_ATTEMPTS = 10;
const TERMINATE_POLL_INTERVAL_MS = 500;
const RESTART_SETTLE_MS = 1000;

export interface LaunchRequest {
  command: string;
  args: string[];
  cwd: string;
  logPath?: string;
}

/** 拉起进程并返回 pid；失败抛 ProcessError */
export type BackendLauncher = (request: LaunchRequest) => Promise<number>;

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * 以独立进程组后台启动，日志追加写入 logPath；supervisor 退出不影响子进程。
 */
export const spawnDetached: BackendLauncher = async ({ command, args, cwd, logPath }) => {
  let fd: number | undefined;
  if (logPath) {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fd = fs.openSync(logPath, 'a');
  }

  try {
    const child = spawn(command, args, {
      cwd,
      env: process.env,
      detached: true,
      stdio: fd === undefined ? 'ignore' : ['ignore', fd, fd],
    });

    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', reject);
    });
    child.unref();

    if (child.pid === undefined) {
      throw new ProcessError(`${command} 启动后未获得 pid`);
    }
    return child.pid;
  } catch (error) {
    if (error instanceof ProcessError) throw error;
    if (hasErrorCode(error, 'ENOENT')) {
      throw new ProcessError(`未找到 ${command} 命令，请确认已安装并在 PATH 中`, { cause: error });
    }
    throw new ProcessError(errorMessage(error), { cause: error });
  } finally {
    // 子进程已持有自己的副本
    if (fd !== undefined) fs.closeSync(fd);
  }
};

export interface BackendSupervisorOptions {
  endpoint: BackendEndpoint;
  logPath?: string;
  command?: readonly string[];
  prober?: Pick<PortProber, 'probe'>;
  isHealthy?: () => Promise<boolean>;
  launcher?: BackendLauncher;
  killProcess?: (pid: number, signal: NodeJS.Signals) => void;
  makeDirectory?: (dir: string) => Promise<void>;
  clock?: Clock;
}

export class BackendSupervisor {
  private readonly endpoint: BackendEndpoint;
  private readonly logPath?: string;
  private readonly command: readonly string[];
  private readonly prober: Pick<PortProber, 'probe'>;
  private readonly isHealthy: () => Promise<boolean>;
  private readonly launcher: BackendLauncher;
  private readonly killProcess: (pid: number, signal: NodeJS.Signals) => void;
  private readonly makeDirectory: (dir: string) => Promise<void>;
  private readonly clock: Clock;

  private state: SupervisorState = 'unknown';
  /** 该端口上当前认定的后端进程，至多一个 */
  private handle: ProcessHandle | null = null;

  constructor(options: BackendSupervisorOptions) {
    this.endpoint = options.endpoint;
    this.logPath = options.logPath;
    this.command = options.command ?? BACKEND_COMMAND;
    this.prober = options.prober ?? new PortProber({ host: options.endpoint.host });
    this.isHealthy = options.isHealthy ?? (() => isBackendHealthy(options.endpoint));
    this.launcher = options.launcher ?? spawnDetached;
    this.killProcess = options.killProcess ?? ((pid, signal) => process.kill(pid, signal));
    this.makeDirectory = options.makeDirectory ?? (async (dir) => {
      await mkdir(dir, { recursive: true });
    });
    this.clock = options.clock ?? systemClock;
  }

  get port(): number {
    return this.endpoint.port;
  }

  getState(): SupervisorState {
    return this.state;
  }

  getHandle(): ProcessHandle | null {
    return this.handle;
  }

  /**
   * 已健康则什么都不做；端口被其他进程占用时报错而不是杀掉它；否则启动并等待健康。
   */
  async ensureRunning(cwd: string): Promise<SupervisorResult> {
    try {
      if (await this.isHealthy()) {
        this.state = 'healthy';
        return { ok: true, message: 'OpenCode 已在运行', handle: this.handle ?? undefined };
      }

      const probe = await this.prober.probe(this.port);
      // 探测期间后端可能刚好就绪，判定冲突前再确认一次
      if (probe.occupied && (await this.isHealthy())) {
        this.state = 'healthy';
        return { ok: true, message: 'OpenCode 已在运行', handle: this.handle ?? undefined };
      }
      if (probe.occupied) {
        this.state = 'occupied_by_other';
        const conflict = new PortConflictError(
          this.port,
          `端口 ${this.port} 已被占用 (pid=${probe.pid ?? '?'}, ${probe.command || '?'})，但非 OpenCode`,
        );
        log('warn', 'backend_port_conflict', { port: this.port, pid: probe.pid, command: probe.command });
        return { ok: false, message: conflict.message };
      }

      const started = await this.start(cwd);
      if (!started.ok) return started;

      if (await this.waitHealthy(START_HEALTH_ATTEMPTS)) {
        return started;
      }
      log('warn', 'backend_start_unhealthy', { port: this.port, attempts: START_HEALTH_ATTEMPTS });
      return { ok: false, message: '已启动但健康检查未通过，请稍后重试', handle: started.handle };
    } catch (error) {
      log('error', 'backend_ensure_failed', { error: errorMessage(error) });
      return { ok: false, message: errorMessage(error) };
    }
  }

  /**
   * 终止端口上的进程（尽力而为）后在 cwd 重新启动，并等待更长的健康窗口。
   */
  async restart(cwd: string): Promise<SupervisorResult> {
    try {
      await this.terminatePortOwner();
      await this.clock.sleep(RESTART_SETTLE_MS);

      const started = await this.start(cwd);
      if (!started.ok) return started;

      if (await this.waitHealthy(RESTART_HEALTH_ATTEMPTS)) {
        return { ok: true, message: `已重启 OpenCode: ${started.message}`, handle: started.handle };
      }
      log('warn', 'backend_restart_unhealthy', { port: this.port, attempts: RESTART_HEALTH_ATTEMPTS });
      return { ok: false, message: `已启动但健康检查未通过: ${started.message}`, handle: started.handle };
    } catch (error) {
      log('error', 'backend_restart_failed', { error: errorMessage(error) });
      return { ok: false, message: errorMessage(error) };
    }
  }

  /**
   * 不等待健康，只负责建目录和拉起进程。
   */
  async start(cwd: string): Promise<SupervisorResult> {
    const workDir = path.resolve(cwd);
    try {
      await this.makeDirectory(workDir);
    } catch (error) {
      const failure = new ProcessError(`无法创建目录 ${workDir}: ${errorMessage(error)}`, { cause: error });
      log('error', 'backend_mkdir_failed', { cwd: workDir, error: errorMessage(error) });
      return { ok: false, message: failure.message };
    }

    const [executable, ...baseArgs] = this.command;
    const args = [...baseArgs, '--port', String(this.port), '--hostname', this.endpoint.host];

    let pid: number;
    try {
      pid = await this.launcher({ command: executable, args, cwd: workDir, logPath: this.logPath });
    } catch (error) {
      log('error', 'backend_spawn_failed', { command: executable, cwd: workDir, error: errorMessage(error) });
      return { ok: false, message: errorMessage(error) };
    }

    this.state = 'starting';
    this.handle = { pid, command: [executable, ...args].join(' '), cwd: workDir };
    log('info', 'backend_spawned', { pid, port: this.port, cwd: workDir });

    return {
      ok: true,
      message: `已启动 opencode serve (pid=${pid}, ${this.endpoint.host}:${this.port}, cwd=${workDir})`,
      handle: this.handle,
    };
  }

  /**
   * SIGTERM → 最多等 10×0.5s 端口释放 → 仍占用则 SIGKILL。
   * 返回端口是否确认已释放；找不到 pid 时无从终止，直接返回。
   */
  async terminatePortOwner(): Promise<boolean> {
    const probe = await this.prober.probe(this.port);
    if (!probe.occupied) {
      this.markStopped();
      return true;
    }
    if (probe.pid === undefined) {
      log('warn', 'backend_terminate_unknown_owner', { port: this.port });
      return false;
    }

    const pid = probe.pid;
    if (!this.signal(pid, 'SIGTERM')) {
      this.markStopped();
      return true;
    }

    const freed = await pollUntil(
      async () => ((await this.prober.probe(this.port)).occupied ? undefined : true),
      { intervalMs: TERMINATE_POLL_INTERVAL_MS, maxAttempts: TERMINATE_POLL_ATTEMPTS, clock: this.clock },
    );
    if (freed.status === 'done') {
      log('info', 'backend_terminated', { pid, signal: 'SIGTERM', attempts: freed.attempts });
      this.markStopped();
      return true;
    }

    log('warn', 'backend_terminate_escalate', { pid });
    this.signal(pid, 'SIGKILL');
    await this.clock.sleep(TERMINATE_POLL_INTERVAL_MS);
    const after = await this.prober.probe(this.port);
    if (!after.occupied) this.markStopped();
    return !after.occupied;
  }

  /**
   * 即时状态：每次都重新探测端口与健康，不使用缓存。
   */
  async status(): Promise<BackendStatus> {
    const probe: PortProbe = await this.prober.probe(this.port);
    const healthy = await this.isHealthy();

    if (healthy) {
      this.state = 'healthy';
    } else if (probe.occupied) {
      this.state = this.state === 'starting' ? 'starting' : 'occupied_by_other';
    } else {
      this.markStopped();
    }

    if (probe.pid !== undefined && this.handle?.pid !== probe.pid) {
      this.handle = { pid: probe.pid, command: probe.command ?? '' };
    }

    return {
      state: this.state,
      port: this.port,
      occupied: probe.occupied,
      healthy,
      pid: probe.pid,
      command: probe.command,
    };
  }

  private async waitHealthy(maxAttempts: number): Promise<boolean> {
    const outcome = await pollUntil(
      async () => ((await this.isHealthy()) ? true : undefined),
      { intervalMs: HEALTH_POLL_INTERVAL_MS, maxAttempts, clock: this.clock },
    );
    if (outcome.status === 'done') {
      this.state = 'healthy';
      log('info', 'backend_healthy', { port: this.port, attempts: outcome.attempts });
      return true;
    }
    return false;
  }

  /** 返回 false 表示进程已不存在 */
  private signal(pid: number, signal: NodeJS.Signals): boolean {
    try {
      this.killProcess(pid, signal);
      log('info', 'backend_signal_sent', { pid, signal });
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ESRCH')) return false;
      // 例如 EPERM：无法终止也继续后续启动
      log('warn', 'backend_signal_failed', { pid, signal, error: errorMessage(error) });
      return true;
    }
  }

  private markStopped(): void {
    this.state = 'stopped';
    this.handle = null;
  }
}
