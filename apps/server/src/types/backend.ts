/** Basic auth 凭据 */
export interface BackendCredentials {
  username: string;
  password: string;
}

/** 后端地址（进程生命周期内不变） */
export interface BackendEndpoint {
  baseUrl: string;
  host: string;
  port: number;
  credentials?: BackendCredentials;
}

/** 已启动或通过端口探测发现的后端进程 */
export interface ProcessHandle {
  pid: number;
  /** 仅用于诊断展示 */
  command: string;
  cwd?: string;
}

/** GET /session 列表项（归一化后） */
export interface SessionInfo {
  id: string;
  title?: string;
  /** 最近活动时间（epoch ms） */
  lastActivity?: number;
}

export interface MessagePart {
  type: string;
  text?: string;
}

export interface BackendMessage {
  info?: {
    id?: string;
    role?: string;
  };
  parts: MessagePart[];
}

export interface HealthStatus {
  healthy: boolean;
  version?: string;
}

/** 消息投递方式：同步请求 / 提交后轮询 */
export type DeliveryMode = 'sync' | 'async';

export type SupervisorState =
  | 'unknown'
  | 'healthy'
  | 'occupied_by_other'
  | 'stopped'
  | 'starting';

/** Supervisor 公共操作的统一返回 */
export interface SupervisorResult {
  ok: boolean;
  message: string;
  handle?: ProcessHandle;
}

export interface BackendStatus {
  state: SupervisorState;
  port: number;
  occupied: boolean;
  healthy: boolean;
  pid?: number;
  command?: string;
}
