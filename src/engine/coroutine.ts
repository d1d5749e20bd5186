import type { RunState, RunStatus, TurnStep } from '../types';
import { RunFinishedError, RunReentryError } from './errors';

/**
 * 一整局游戏的可挂起计算，由驱动方逐回合恢复。
 *
 * - 首次 start()/resume() 启动主体，跑到第一个 yield_event；首次 resume 传入的 input 被忽略
 *   （还没有挂起点在等它）。
 * - 之后每次 resume(input) 把 input 交给当前挂起点，跑到下一个 yield_event 或 return。
 * - 结束（completed / failed）后再恢复抛 RunFinishedError；
 *   主体内部重入恢复抛 RunReentryError。
 */
export class Coroutine<E, I, O> {
  private state: RunState<E, O> = { status: 'not_started' };
  private running = false;

  constructor(private readonly body: Generator<E, O, I>) {}

  get status(): RunStatus {
    return this.state.status;
  }

  /** 最近一次挂起时给出的事件（仅 awaiting_input 时有值） */
  get last_event(): E | undefined {
    return this.state.status === 'awaiting_input' ? this.state.event : undefined;
  }

  /** 整局结果（仅 completed 时有值） */
  get outcome(): O | undefined {
    return this.state.status === 'completed' ? this.state.outcome : undefined;
  }

  /**
   * 不带输入地启动主体。
   * 已启动且在等待输入时不推进，直接返回当前挂起的事件。
   */
  start(): TurnStep<E, O> {
    this.check_resumable();
    if (this.state.status === 'awaiting_input') {
      return { kind: 'yielded', event: this.state.event };
    }
    return this.advance(() => this.body.next());
  }

  resume(input: I): TurnStep<E, O> {
    this.check_resumable();
    if (this.state.status === 'not_started') {
      return this.advance(() => this.body.next());
    }
    return this.advance(() => this.body.next(input));
  }

  private check_resumable(): void {
    if (this.running) throw new RunReentryError();
    if (this.state.status === 'completed' || this.state.status === 'failed') {
      throw new RunFinishedError();
    }
  }

  private advance(step: () => IteratorResult<E, O>): TurnStep<E, O> {
    this.running = true;
    let result: IteratorResult<E, O>;
    try {
      result = step();
    } catch (error) {
      this.state = { status: 'failed', error };
      throw error;
    } finally {
      this.running = false;
    }

    if (result.done) {
      this.state = { status: 'completed', outcome: result.value };
      return { kind: 'complete', outcome: result.value };
    }
    this.state = { status: 'awaiting_input', event: result.value };
    return { kind: 'yielded', event: result.value };
  }
}
