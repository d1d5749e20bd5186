/**
 * 驱动器（Driver）
 * 调用 host.play() 开局，按策略逐回合提供输入直到产出 Outcome，
 * 产出回合数、事件轨迹与结束时的状态哈希。
 */
import type { DriveError, DriveErrorCode, DriveSummary, TurnStep } from '../types';
import type { Host } from './host';
import type { Strategy } from './strategy';

/**
 * 驱动器的配置项
 */
export interface DriveOptions<G, E, I> {
  strategy: Strategy<E, I, G>;
  /** limit of events per run (default 100) */
  max_turns?: number;
  /** when true (default), collect the yielded events */
  collect_trajectory?: boolean;
}

function err(code: DriveErrorCode, message: string, details?: unknown): DriveError {
  return { code, message, details };
}

/**
 * 同步驱动一整局：
 * - play() 失败：原样透传 ALREADY_STARTED / IN_USE
 * - 策略返回 null：以 NO_INPUT 结束
 * - 策略抛错：以 STRATEGY_THREW 结束
 * - 事件数超过 max_turns 仍未结束：以 MAX_TURNS 结束
 * 主体本身抛出的错误不拦截，直接抛给调用方。
 */
export function drive<G, E, I, O>(
  host: Host<G, E, I, O>,
  opts: DriveOptions<NoInfer<G>, E, I>,
): DriveSummary<E, O> {
  const { strategy, max_turns = 100, collect_trajectory = true } = opts;

  const started = host.play();
  if (!started.ok) {
    return { ok: false, turns: 0, error: { ...started.error } };
  }
  const co = started.coroutine;

  const events: E[] = [];
  let turns = 0;

  // 统一收尾：带上轨迹与状态哈希
  const finish = (extra: Pick<DriveSummary<E, O>, 'ok' | 'outcome' | 'error'>): DriveSummary<E, O> => ({
    ...extra,
    turns,
    events: collect_trajectory ? events : undefined,
    state_hash: host.state_hash(),
  });

  let step: TurnStep<E, O> = co.start();
  while (step.kind === 'yielded') {
    turns++;
    if (collect_trajectory) events.push(step.event);

    if (turns > max_turns) {
      return finish({ ok: false, error: err('MAX_TURNS', `run did not finish within ${max_turns} turns`) });
    }

    let choice: { input: I } | null;
    try {
      choice = strategy.choose(step.event, { turn: turns, game: host.clone_game() });
    } catch (e) {
      return finish({
        ok: false,
        error: err('STRATEGY_THREW', e instanceof Error ? e.message : String(e), { turn: turns }),
      });
    }

    if (!choice) {
      return finish({ ok: false, error: err('NO_INPUT', `strategy gave no input at turn ${turns}`) });
    }

    step = co.resume(choice.input);
  }

  return finish({ ok: true, outcome: step.outcome });
}
