import type { Strategy } from '../strategy';

/** 每回合都交出同一个输入（常用于 Input 为 void 的游戏） */
export function constant_strategy<E, I>(input: I): Strategy<E, I> {
  return {
    choose() {
      return { input };
    },
  };
}
