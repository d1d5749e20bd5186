import { createHash } from "crypto";

/**
 * 游戏状态的规范化 JSON：对象 key 深度按字典序排列，与字段的插入顺序无关。
 * null 原样保留（如尚未分出胜负的 outcome），{ outcome: null } 与 {} 是两种状态。
 * undefined 字段与 JSON.stringify 一致地省略。
 */
export function canonical_stringify(state: unknown): string {
  return JSON.stringify(state, (_key, value: unknown) => (is_record(value) ? sort_keys(value) : value));
}

/** 状态哈希："sha256:" + 规范化 JSON 的十六进制摘要 */
export function hash_state(state: unknown): string {
  const digest = createHash("sha256").update(canonical_stringify(state), "utf8").digest("hex");
  return `sha256:${digest}`;
}

function is_record(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// 只排当前这一层；更深的层由 stringify 继续回调
function sort_keys(v: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const k of Object.keys(v).sort()) out[k] = v[k];
  return out;
}
