import { z } from 'zod';

/**
 * CLI 输入脚本 v0 的结构校验：
 * 指定要跑的示例游戏、开局设置以及按顺序提供给 coroutine 的输入。
 */

/** 出拳 */
const Script_Choice = z.enum(['Rock', 'Paper', 'Scissors']);

/** 棋盘位置（越界位置也允许写入脚本，由游戏本身判为 INVALID_MOVE） */
const Script_Pos = z.object({
  col: z.number().int('col 必须是整数'),
  row: z.number().int('row 必须是整数'),
});

const Script_Common = {
  /** 脚本结构版本（目前只有 0） */
  schema_version: z.literal(0),
  /** 单局事件数上限 */
  max_turns: z.number().int().min(1, 'max_turns 不能小于 1').optional(),
};

/** 石头剪刀布：输入为空，开局时给定两名玩家的出拳 */
const Script_RoShamBo = z.object({
  ...Script_Common,
  game: z.literal('ro-sham-bo'),
  setup: z.object({
    player_1: Script_Choice,
    player_2: Script_Choice,
  }),
});

/** 井字棋：按顺序给出每一手的位置 */
const Script_TicTacToe = z.object({
  ...Script_Common,
  game: z.literal('tic-tac-toe'),
  inputs: z.array(Script_Pos),
});

export const Script = z.discriminatedUnion('game', [Script_RoShamBo, Script_TicTacToe]);

export type ScriptType = z.infer<typeof Script>;

/** 安全解析脚本：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_script(input: unknown) {
  return Script.safeParse(input);
}
