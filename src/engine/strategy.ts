/** 策略每回合看到的上下文 */
export interface StrategyContext<G> {
  /** 当前是第几回合（从 1 开始，等于已产出的事件数） */
  turn: number;
  /** 游戏状态的深拷贝快照；策略对它的修改不会影响实际状态 */
  game: G;
}

/**
 * 驱动器的输入来源：根据刚挂起的事件决定下一次 resume 的输入。
 * 返回 null 表示放弃（驱动器以 NO_INPUT 结束）。
 * 输入包在 { input } 里，使 void / undefined 也能作为合法输入。
 */
export interface Strategy<E, I, G = unknown> {
  choose(event: E, ctx: StrategyContext<G>): { input: I } | null;
}
