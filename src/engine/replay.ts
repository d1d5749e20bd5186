import type { Host } from './host';
import { BorrowError, ReplayError } from './errors';

export interface ReplayResult<E> {
  /** 经过 handle_event 处理后的事件（顺序与输入一致） */
  events: E[];
  /** 全部回放之后的状态哈希 */
  state_hash: string;
}

/**
 * 把外部来源的事件（例如远端对手产生的）按顺序作用到本地状态上。
 * 走的是与 yield_event 相同的 handle_event 钩子，因此两端用同样的事件序列
 * 会得到同样的 state_hash。
 *
 * 有事务正在进行时无法回放，抛出 ReplayError（cause 为 BorrowError）。
 */
export function replay_events<G, E, I, O>(host: Host<G, E, I, O>, events: Iterable<E>): ReplayResult<E> {
  const processed: E[] = [];
  for (const event of events) {
    try {
      processed.push(host.process_event(event));
    } catch (e) {
      if (e instanceof BorrowError) throw new ReplayError(processed.length, e);
      throw e;
    }
  }
  return { events: processed, state_hash: host.state_hash() };
}
