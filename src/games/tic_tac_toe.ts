/**
 * 井字棋（示例 Play 能力）
 *
 * Input 是要落子的位置；每回合 yield 一个事件：
 *  - { ok: true, player }：轮到谁落子
 *  - { ok: false, error: 'INVALID_MOVE' }：上一手非法（越界或已被占），同一玩家重下
 * 有人连成一线或棋盘下满即结束。
 */
import type { Play } from '../types';

export type Player = 'X' | 'O';

/** 棋盘边长 */
export const BOARD_SIZE = 3;

export interface Pos {
  col: number;
  row: number;
}

/** 一条直线：某一行、某一列，或两条对角线之一（flipped 为从左下到右上） */
export type Line =
  | { kind: 'row'; row: number }
  | { kind: 'col'; col: number }
  | { kind: 'diagonal'; flipped: boolean };

export type TicTacToeEvent =
  | { ok: true; player: Player }
  | { ok: false; error: 'INVALID_MOVE' };

export type TicTacToeOutcome =
  | { kind: 'cats_game' }
  | { kind: 'win'; player: Player; line: Line };

export interface TicTacToeGame {
  current_player: Player;
  /** 行优先存储：index = row * BOARD_SIZE + col */
  board: (Player | null)[];
  outcome: TicTacToeOutcome | null;
}

export function new_tic_tac_toe(): TicTacToeGame {
  return {
    current_player: 'X',
    board: Array.from({ length: BOARD_SIZE * BOARD_SIZE }, () => null),
    outcome: null,
  };
}

export function next_player(player: Player): Player {
  return player === 'X' ? 'O' : 'X';
}

/** 合法位置返回下标，越界或非整数返回 null */
export function to_index(pos: Pos): number | null {
  const { col, row } = pos;
  if (!Number.isInteger(col) || !Number.isInteger(row)) return null;
  if (col < 0 || row < 0 || col >= BOARD_SIZE || row >= BOARD_SIZE) return null;
  return row * BOARD_SIZE + col;
}

/** 为当前玩家占据 pos；非法返回 false 且不改动状态 */
export function take_turn(game: TicTacToeGame, pos: Pos): boolean {
  const index = to_index(pos);
  if (index === null || game.board[index] !== null) return false;

  game.board[index] = game.current_player;
  game.current_player = next_player(game.current_player);
  return true;
}

/** 判定顺序：逐个 offset 先行后列，最后两条对角线 */
export function all_lines(): Line[] {
  const lines: Line[] = [];
  for (let offset = 0; offset < BOARD_SIZE; offset++) {
    lines.push({ kind: 'row', row: offset });
    lines.push({ kind: 'col', col: offset });
  }
  lines.push({ kind: 'diagonal', flipped: false });
  lines.push({ kind: 'diagonal', flipped: true });
  return lines;
}

export function line_positions(line: Line): Pos[] {
  const positions: Pos[] = [];
  for (let offset = 0; offset < BOARD_SIZE; offset++) {
    switch (line.kind) {
      case 'row':
        positions.push({ col: offset, row: line.row });
        break;
      case 'col':
        positions.push({ col: line.col, row: offset });
        break;
      case 'diagonal':
        positions.push({ col: offset, row: line.flipped ? BOARD_SIZE - offset - 1 : offset });
        break;
    }
  }
  return positions;
}

export function tile(game: TicTacToeGame, pos: Pos): Player | null {
  const index = to_index(pos);
  return index === null ? null : game.board[index];
}

/** 一条线上的格子全属于同一玩家时返回该玩家 */
export function check_line(game: TicTacToeGame, line: Line): Player | null {
  let owner: Player | null = null;
  for (const pos of line_positions(line)) {
    const t = tile(game, pos);
    if (t === null || (owner !== null && t !== owner)) return null;
    owner = t;
  }
  return owner;
}

/** 有人连线 → win；无空格 → cats_game；否则 null（继续） */
export function check_outcome(game: TicTacToeGame): TicTacToeOutcome | null {
  for (const line of all_lines()) {
    const player = check_line(game, line);
    if (player) return { kind: 'win', player, line };
  }
  if (game.board.every((t) => t !== null)) return { kind: 'cats_game' };
  return null;
}

export const tic_tac_toe: Play<TicTacToeGame, TicTacToeEvent, Pos, TicTacToeOutcome> = {
  *play(ctx) {
    let last_move_ok = true;

    for (;;) {
      let event: TicTacToeEvent = { ok: false, error: 'INVALID_MOVE' };
      if (last_move_ok) {
        const guard = ctx.host.borrow_game();
        event = { ok: true, player: guard.value.current_player };
        guard.release();
      }

      // 等待当前玩家给出落子位置；挂起前守卫已释放
      const pos = yield* ctx.yield_event(event);

      const guard = ctx.host.borrow_game_mut();
      last_move_ok = take_turn(guard.value, pos);
      guard.release();
      if (!last_move_ok) continue;

      const outcome = ctx.host.with_game((game) => check_outcome(game));
      if (outcome) {
        ctx.host.with_game_mut((game) => {
          game.outcome = outcome;
        });
        return outcome;
      }
    }
  },

  copy_game(game) {
    return { ...game, board: [...game.board] };
  },
};
