import type { Host } from './host';
import { NoDefaultEventError } from './errors';

/**
 * 每次 play() 创建一个，交给游戏主体使用。
 *
 * host 公开：主体可以自己开事务读写状态（但不能跨越挂起点持有事务）。
 * yield_event / yield_default 是唯一的挂起点，必须用 `yield*` 委托：
 *
 *   const input = yield* ctx.yield_event(event);
 *
 * 只调用而不 `yield*` 的话什么都不会发生（生成器不会执行）。
 */
export class Context<G, E, I, O> {
  constructor(readonly host: Host<G, E, I, O>) {}

  /**
   * 先在写事务内让游戏对事件作出反应（Play.handle_event），
   * 事务释放后再把（可能被修改的）事件交给驱动方并挂起；
   * 恢复时驱动方提供的 Input 即为本表达式的值。
   */
  *yield_event(event: E): Generator<E, I, I> {
    const processed = this.host.process_event(event);
    return yield processed;
  }

  /** 以 Play.default_event() 的值调用 yield_event */
  *yield_default(): Generator<E, I, I> {
    const capability = this.host.capability;
    if (!capability.default_event) throw new NoDefaultEventError();
    return yield* this.yield_event(capability.default_event());
  }
}
