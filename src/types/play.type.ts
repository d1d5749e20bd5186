/** ---------------------------
 *  Play 能力（具体游戏需要实现的接口）
 * ---------------------------*/

import type { Context } from '../engine/context';

/**
 * 一个可被 Host 驱动的回合制游戏。
 *
 * - G：游戏状态（由 Host 独占持有）
 * - E：每次挂起时抛给驱动方的事件
 * - I：驱动方每次恢复时提供的输入
 * - O：整局结束时的结果
 */
export interface Play<G, E, I, O> {
  /**
   * 整局游戏的主体，相当于游戏的 main。
   * 只能通过 `yield* ctx.yield_event(...)` / `yield* ctx.yield_default()` 挂起；
   * 恢复时得到驱动方提供的 Input。return 的值即本局 Outcome。
   */
  play(ctx: Context<G, E, I, O>): Generator<E, O, I>;

  /**
   * 事件到达驱动方之前的反应钩子（写事务内执行）。
   * 可就地修改 event，也可返回一个替换值；不返回则沿用原 event。
   * 同时服务于 yield_event 与外部直接调用的 Host.process_event。
   * 不允许在此挂起，也不允许再开事务。
   */
  handle_event?(game: G, event: E): E | void;

  /** yield_default 使用的默认事件。未提供时 yield_default 会抛错。 */
  default_event?(): E;

  /** Host.game() 的快照实现（可选；默认 structuredClone）。返回值不得与实时状态共享可变对象。 */
  copy_game?(game: G): G;

  /** Host.clone_game() 的深拷贝实现（可选；默认 structuredClone）。 */
  clone_game?(game: G): G;
}

/** 单个 Host 共享的会话状态：started 标记 + 游戏状态本身 */
export interface SharedState<G> {
  started: boolean;
  game: G;
}
