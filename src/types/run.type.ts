/** ---------------------------
 *  运行期（启动 / 单步 / 驱动摘要）
 * ---------------------------*/

import type { Coroutine } from '../engine/coroutine';

/**
 * play() 的失败原因：
 * - ALREADY_STARTED：该共享状态上已经开过一局（永久，需新建 Host）
 * - IN_USE：有事务正在进行，连 started 标记都无法检查（暂时，可重试）
 */
export type PlayErrorCode = 'ALREADY_STARTED' | 'IN_USE';

export interface PlayError {
  code: PlayErrorCode;
  message: string;
}

/** play() 的返回：成功给出 coroutine，失败给出结构化错误（不抛出） */
export type PlayResult<E, I, O> =
  | { ok: true; coroutine: Coroutine<E, I, O> }
  | { ok: false; error: PlayError };

/** 单次恢复的结果：挂起并给出事件，或整局结束并给出结果 */
export type TurnStep<E, O> =
  | { kind: 'yielded'; event: E }
  | { kind: 'complete'; outcome: O };

/**
 * 一局的隐式状态机：
 * not_started → awaiting_input（首个 yield_event）
 * awaiting_input → awaiting_input（每次 恢复→再挂起）
 * awaiting_input / not_started → completed（主体 return）
 * 任意运行中状态 → failed（主体抛错）
 */
export type RunStatus = 'not_started' | 'awaiting_input' | 'completed' | 'failed';

export type RunState<E, O> =
  | { status: 'not_started' }
  | { status: 'awaiting_input'; event: E }
  | { status: 'completed'; outcome: O }
  | { status: 'failed'; error: unknown };

/** 驱动器停止时的错误码（PlayError 的错误码原样透传） */
export type DriveErrorCode = PlayErrorCode | 'NO_INPUT' | 'MAX_TURNS' | 'STRATEGY_THREW';

export interface DriveError {
  code: DriveErrorCode;
  message: string;
  details?: unknown;
}

/** 驱动一整局后的摘要 */
export interface DriveSummary<E, O> {
  /** 是否跑到了 Outcome */
  ok: boolean;
  outcome?: O;
  /** 已产出的事件数（每个事件对应一个回合） */
  turns: number;
  /** 事件轨迹（collect_trajectory 为 true 时给出） */
  events?: E[];
  /** 结束时游戏状态的规范化哈希（sha256:...）；play() 失败时为空 */
  state_hash?: string;
  error?: DriveError;
}
