import type { Strategy } from '../strategy';

/** 按给定顺序逐个交出输入；用完之后返回 null */
export function scripted_strategy<E, I>(inputs: readonly I[]): Strategy<E, I> {
  let cursor = 0;
  return {
    choose() {
      if (cursor >= inputs.length) return null;
      return { input: inputs[cursor++] };
    },
  };
}
