/**
 * 后端相关错误分类
 *
 * kind 作为判别字段，投递层据此生成结果，编排层据此决定是否重试。
 */

export type BackendErrorKind =
  | 'network'
  | 'protocol'
  | 'not_found'
  | 'timeout'
  | 'process'
  | 'port_conflict';

export class BackendError extends Error {
  readonly kind: BackendErrorKind;

  constructor(kind: BackendErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackendError';
    this.kind = kind;
  }
}

/** 连接失败：后端不可达 */
export class NetworkError extends BackendError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('network', message, options);
    this.name = 'NetworkError';
  }
}

/** 后端可达但响应不符合约定（空 body、非 JSON、非 2xx、结构不对） */
export class ProtocolError extends BackendError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('protocol', message, options);
    this.name = 'ProtocolError';
    this.status = status;
  }
}

/** 会话 id 已不被后端识别（HTTP 404） */
export class NotFoundError extends BackendError {
  constructor(message: string) {
    super('not_found', message);
    this.name = 'NotFoundError';
  }
}

/** 请求或轮询的截止时间已到，后端可能仍在计算 */
export class BackendTimeoutError extends BackendError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('timeout', message, options);
    this.name = 'BackendTimeoutError';
  }
}

/** 无法拉起后端进程（可执行文件缺失、目录无法创建） */
export class ProcessError extends BackendError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('process', message, options);
    this.name = 'ProcessError';
  }
}

/** 端口被非后端的不健康进程占用 */
export class PortConflictError extends BackendError {
  readonly port: number;

  constructor(port: number, message: string) {
    super('port_conflict', message);
    this.name = 'PortConflictError';
    this.port = port;
  }
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}
