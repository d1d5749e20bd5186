import type { Play } from '../../types';

/** 累加器：每回合报告当前总数，输入负数时结束并返回总数 */
export interface Counter {
  count: number;
  history: string[];
}

export function new_counter(): Counter {
  return { count: 0, history: [] };
}

export const counter: Play<Counter, string, number, number> = {
  *play(ctx) {
    let total = 0;
    for (;;) {
      const n = yield* ctx.yield_event(`total=${total}`);
      if (n < 0) return total;
      total += n;
      ctx.host.with_game_mut((game) => {
        game.count = total;
      });
    }
  },

  handle_event(game, event) {
    game.history.push(event);
  },
};
