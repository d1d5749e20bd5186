/**
 * 石头剪刀布（示例 Play 能力）
 *
 * 两名玩家的出拳在开局前已经确定；主体依次喊出 "Ro!" "Sham!" "Bo!"，
 * 然后按循环克制关系判定胜负，再用一条消息事件公布结果。
 * Outcome 始终相对玩家 1 而言。
 */
import type { Play } from '../types';

export type Choice = 'Rock' | 'Paper' | 'Scissors';

export type RoShamBoOutcome = 'tie' | 'win' | 'loss';

export interface RoShamBoGame {
  player_1: Choice;
  player_2: Choice;
  /** handle_event 记录下的所有消息（按到达顺序） */
  log: string[];
}

/** 每种出拳克制的对象：Rock > Scissors > Paper > Rock */
const BEATS: Record<Choice, Choice> = {
  Rock: 'Scissors',
  Paper: 'Rock',
  Scissors: 'Paper',
};

export function compare_choices(a: Choice, b: Choice): RoShamBoOutcome {
  if (a === b) return 'tie';
  return BEATS[a] === b ? 'win' : 'loss';
}

export function describe_outcome(player_1: Choice, player_2: Choice, outcome: RoShamBoOutcome): string {
  switch (outcome) {
    case 'tie':
      return `${player_1} ties with ${player_2}.`;
    case 'win':
      return `${player_1} beats ${player_2}.`;
    case 'loss':
      return `${player_2} beats ${player_1}.`;
  }
}

export function new_ro_sham_bo(player_1: Choice, player_2: Choice): RoShamBoGame {
  return { player_1, player_2, log: [] };
}

export const ro_sham_bo: Play<RoShamBoGame, string, void, RoShamBoOutcome> = {
  *play(ctx) {
    // 倒数，然后同时亮拳
    yield* ctx.yield_event('Ro!');
    yield* ctx.yield_event('Sham!');
    yield* ctx.yield_event('Bo!');

    const { player_1, player_2 } = ctx.host.game();
    const outcome = compare_choices(player_1, player_2);

    yield* ctx.yield_event(describe_outcome(player_1, player_2, outcome));

    return outcome;
  },

  handle_event(game, event) {
    game.log.push(event);
  },

  copy_game(game) {
    return { ...game, log: [...game.log] };
  },
};
