import type { PlayError, PlayErrorCode } from '../types';

/** 构造 PlayError 的小工具（统一结构） */
export function play_error(code: PlayErrorCode, message: string): PlayError {
  return { code, message };
}

/** 事务冲突：在已有事务打开时再开事务，或使用已释放的守卫。属于编程错误，立即抛出。 */
export class BorrowError extends Error {
  readonly code = 'BORROW_CONFLICT';

  constructor(message: string) {
    super(message);
    this.name = 'BorrowError';
  }
}

/** 对已结束（completed / failed）的一局继续 resume */
export class RunFinishedError extends Error {
  readonly code = 'RUN_FINISHED';

  constructor() {
    super('run has already finished and cannot be resumed');
    this.name = 'RunFinishedError';
  }
}

/** 在主体或事件钩子内部重入 resume */
export class RunReentryError extends Error {
  readonly code = 'RUN_REENTRY';

  constructor() {
    super('run is currently executing and cannot be resumed from inside itself');
    this.name = 'RunReentryError';
  }
}

/** Play 能力未提供 default_event 时调用 yield_default */
export class NoDefaultEventError extends Error {
  readonly code = 'NO_DEFAULT_EVENT';

  constructor() {
    super('yield_default requires the capability to define default_event()');
    this.name = 'NoDefaultEventError';
  }
}

/** 回放外部事件失败（第 index 个事件无法处理） */
export class ReplayError extends Error {
  readonly code = 'REPLAY_FAILED';

  constructor(readonly index: number, cause: unknown) {
    super(`failed to replay event #${index}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'ReplayError';
    this.cause = cause;
  }
}
