/**
 * 把一份已校验的脚本跑成一局：选出示例游戏、建 Host、用驱动器跑到结束。
 * 与命令行解耦，便于测试。
 */
import { drive } from '../engine/drive';
import { create_host } from '../engine/host';
import { constant_strategy, scripted_strategy } from '../engine/strategies';
import type { Strategy } from '../engine/strategy';
import { new_ro_sham_bo, ro_sham_bo } from '../games/ro_sham_bo';
import { new_tic_tac_toe, tic_tac_toe, type Pos, type TicTacToeEvent } from '../games/tic_tac_toe';
import { issue, parse_script, type ScriptType } from '../schema';
import type { DriveSummary, ValidationIssue } from '../types';

/** 每个事件到达驱动方时的回调（CLI 用来打印） */
export type EventObserver = (event: unknown, turn: number) => void;

export type LoadScriptResult =
  | { ok: true; script: ScriptType }
  | { ok: false; errors: ValidationIssue[] };

/** 解析脚本文本：先 JSON，再 zod 结构校验 */
export function load_script(text: string): LoadScriptResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return { ok: false, errors: [issue('INVALID_JSON', '/', e instanceof Error ? e.message : String(e))] };
  }

  const result = parse_script(raw);
  if (!result.success) {
    // 把 Zod 的 issues 转成 ValidationIssue[]
    const errors = result.error.issues.map((e) => issue('SCHEMA_ERROR', '/' + e.path.join('/'), e.message));
    return { ok: false, errors };
  }
  return { ok: true, script: result.data };
}

function observed<E, I, G>(strategy: Strategy<E, I, G>, on_event?: EventObserver): Strategy<E, I, G> {
  if (!on_event) return strategy;
  return {
    choose(event, ctx) {
      on_event(event, ctx.turn);
      return strategy.choose(event, ctx);
    },
  };
}

export function run_script(script: ScriptType, on_event?: EventObserver): DriveSummary<unknown, unknown> {
  switch (script.game) {
    case 'ro-sham-bo': {
      const { player_1, player_2 } = script.setup;
      const host = create_host(ro_sham_bo, new_ro_sham_bo(player_1, player_2));
      return drive(host, {
        strategy: observed(constant_strategy<string, void>(undefined), on_event),
        max_turns: script.max_turns,
      });
    }
    case 'tic-tac-toe': {
      const host = create_host(tic_tac_toe, new_tic_tac_toe());
      return drive(host, {
        strategy: observed(scripted_strategy<TicTacToeEvent, Pos>(script.inputs), on_event),
        max_turns: script.max_turns,
      });
    }
  }
}
