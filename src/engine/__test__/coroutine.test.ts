/**
 * 挂起 / 恢复协议
 *
 * 覆盖范围：
 * - 事件顺序与输入顺序一一对应；首次恢复的输入被忽略
 * - yield_event 在挂起前处理事件并释放事务
 * - yield_default
 * - 结束 / 失败 / 重入 的状态机约束
 * - 同样的初始状态 + 输入序列 → 同样的事件与结果
 */
import { describe, it, expect } from 'vitest';

import { create_host, type Host } from '../host';
import type { Coroutine } from '../coroutine';
import { NoDefaultEventError, RunFinishedError, RunReentryError } from '../errors';
import type { Play } from '../../types';
import { counter, new_counter } from './fixtures';

function start_run<G, E, I, O>(host: Host<G, E, I, O>): Coroutine<E, I, O> {
  const started = host.play();
  if (!started.ok) throw new Error(`play failed: ${started.error.code}`);
  return started.coroutine;
}

describe('Coroutine turn protocol', () => {
  it('yields events in call order and consumes inputs in supply order', () => {
    const host = create_host(counter, new_counter());
    const co = start_run(host);

    expect(co.start()).toEqual({ kind: 'yielded', event: 'total=0' });
    expect(co.status).toBe('awaiting_input');
    expect(co.last_event).toBe('total=0');

    expect(co.resume(2)).toEqual({ kind: 'yielded', event: 'total=2' });
    expect(co.resume(3)).toEqual({ kind: 'yielded', event: 'total=5' });
    expect(co.resume(-1)).toEqual({ kind: 'complete', outcome: 5 });

    expect(co.status).toBe('completed');
    expect(co.outcome).toBe(5);
    expect(co.last_event).toBeUndefined();
    expect(host.game()).toEqual({ count: 5, history: ['total=0', 'total=2', 'total=5'] });
  });

  it('ignores the input given to the first resume', () => {
    const host = create_host(counter, new_counter());
    const co = start_run(host);
    expect(co.resume(99)).toEqual({ kind: 'yielded', event: 'total=0' });
    expect(co.resume(1)).toEqual({ kind: 'yielded', event: 'total=1' });
  });

  it('returns the pending event from start() without advancing', () => {
    const host = create_host(counter, new_counter());
    const co = start_run(host);
    co.start();
    expect(co.start()).toEqual({ kind: 'yielded', event: 'total=0' });
    expect(host.game().history).toEqual(['total=0']);
  });

  // 挂起期间没有事务处于打开状态，驱动方可以自由读写
  it('leaves no transaction open while suspended', () => {
    const host = create_host(counter, new_counter());
    const co = start_run(host);
    co.start();

    expect(host.is_borrowed).toBe(false);
    host.with_game_mut((game) => {
      game.history.push('driver');
    });
    expect(co.resume(1)).toEqual({ kind: 'yielded', event: 'total=1' });
    expect(host.game().history).toEqual(['total=0', 'driver', 'total=1']);
  });

  it('hands the mutated event to the driver', () => {
    interface Note {
      text: string;
      seen_at: number | null;
    }
    const stamp: Play<{ clock: number }, Note, void, number> = {
      *play(ctx) {
        yield* ctx.yield_event({ text: 'a', seen_at: null });
        yield* ctx.yield_event({ text: 'b', seen_at: null });
        return ctx.host.game().clock;
      },
      handle_event(game, event) {
        game.clock += 1;
        event.seen_at = game.clock;
      },
    };
    const co = start_run(create_host(stamp, { clock: 0 }));
    expect(co.start()).toEqual({ kind: 'yielded', event: { text: 'a', seen_at: 1 } });
    expect(co.resume()).toEqual({ kind: 'yielded', event: { text: 'b', seen_at: 2 } });
    expect(co.resume()).toEqual({ kind: 'complete', outcome: 2 });
  });

  it('completes without yielding when the body returns at once', () => {
    const instant: Play<null, string, void, string> = {
      *play() {
        return 'done';
      },
    };
    const co = start_run(create_host(instant, null));
    expect(co.start()).toEqual({ kind: 'complete', outcome: 'done' });
    expect(co.status).toBe('completed');
  });
});

describe('Context.yield_default', () => {
  it('yields the capability default event', () => {
    const idle: Play<string[], string, void, number> = {
      *play(ctx) {
        yield* ctx.yield_default();
        yield* ctx.yield_default();
        return ctx.host.game().length;
      },
      handle_event(game, event) {
        game.push(event);
      },
      default_event() {
        return 'wait';
      },
    };
    const host = create_host(idle, []);
    const co = start_run(host);
    expect(co.start()).toEqual({ kind: 'yielded', event: 'wait' });
    expect(co.resume()).toEqual({ kind: 'yielded', event: 'wait' });
    expect(co.resume()).toEqual({ kind: 'complete', outcome: 2 });
    expect(host.game()).toEqual(['wait', 'wait']);
  });

  it('fails the run when no default event is defined', () => {
    const bare: Play<null, string, void, void> = {
      *play(ctx) {
        yield* ctx.yield_default();
      },
    };
    const co = start_run(create_host(bare, null));
    expect(() => co.start()).toThrow(NoDefaultEventError);
    expect(co.status).toBe('failed');
    expect(() => co.resume()).toThrow(RunFinishedError);
  });
});

describe('Coroutine state machine', () => {
  it('rejects resuming a completed run', () => {
    const co = start_run(create_host(counter, new_counter()));
    co.start();
    co.resume(-1);
    expect(() => co.resume(1)).toThrow(RunFinishedError);
    expect(() => co.start()).toThrow(RunFinishedError);
  });

  it('propagates an error thrown by the body and marks the run failed', () => {
    const broken: Play<null, string, number, void> = {
      *play(ctx) {
        const n = yield* ctx.yield_event('go');
        throw new Error(`bad input ${n}`);
      },
    };
    const co = start_run(create_host(broken, null));
    co.start();
    expect(() => co.resume(7)).toThrow('bad input 7');
    expect(co.status).toBe('failed');
    expect(() => co.resume(8)).toThrow(RunFinishedError);
  });

  it('rejects a resume issued from inside the running body', () => {
    const holder: { co?: Coroutine<string, void, void> } = {};
    const sneaky: Play<null, string, void, void> = {
      *play(ctx) {
        yield* ctx.yield_event('first');
        holder.co?.resume();
      },
    };
    const co = start_run(create_host(sneaky, null));
    holder.co = co;
    co.start();
    expect(() => co.resume()).toThrow(RunReentryError);
    expect(co.status).toBe('failed');
  });

  it('fails the run when the body leaves a transaction open across a suspension', () => {
    const leaky: Play<number, string, void, void> = {
      *play(ctx) {
        ctx.host.borrow_game_mut();
        yield* ctx.yield_event('never');
      },
    };
    const co = start_run(create_host(leaky, 0));
    // yield_event 自己的写事务被未释放的守卫挡住，挂起前就失败
    expect(() => co.start()).toThrow('cannot open a write transaction while a write transaction is open');
    expect(co.status).toBe('failed');
  });
});

describe('determinism', () => {
  it('reproduces events and outcome for the same inputs and initial state', () => {
    const run = (inputs: number[]) => {
      const host = create_host(counter, new_counter());
      const co = start_run(host);
      const events: string[] = [];
      let step = co.start();
      for (const input of inputs) {
        if (step.kind !== 'yielded') break;
        events.push(step.event);
        step = co.resume(input);
      }
      return { events, step, hash: host.state_hash() };
    };

    const first = run([4, 1, 6, -1]);
    const second = run([4, 1, 6, -1]);
    expect(first).toEqual(second);
    expect(first.events).toEqual(['total=0', 'total=4', 'total=5', 'total=11']);
    expect(first.step).toEqual({ kind: 'complete', outcome: 11 });
  });
});
