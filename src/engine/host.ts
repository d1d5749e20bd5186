import type { Play, PlayResult, SharedState } from '../types';
import { hash_state } from '../utils/canonical.util';
import { BorrowCell, type Lease } from './borrow_cell';
import { Context } from './context';
import { Coroutine } from './coroutine';
import { BorrowError, play_error } from './errors';

/** borrow_game() 返回的读守卫：守卫存活（未 release）期间事务一直打开 */
export class GameGuard<G> {
  constructor(protected readonly lease: Lease<SharedState<G>>) {}

  get value(): G {
    return this.lease.get().game;
  }

  get released(): boolean {
    return this.lease.released;
  }

  release(): void {
    this.lease.release();
  }
}

/** borrow_game_mut() 返回的写守卫，可整体替换游戏状态 */
export class GameGuardMut<G> extends GameGuard<G> {
  set(next: G): void {
    this.lease.get().game = next;
  }
}

function is_replacement<E>(value: E | void): value is E {
  return value !== undefined;
}

/**
 * 管理一局游戏：持有共享状态，构建并驱动 coroutine，提供事务式读写。
 *
 * 多个 Host 句柄（clone）指向同一份 SharedState；clone 只共享，不复制。
 * 同一 SharedState 上任意时刻只允许一个事务（读写一视同仁），
 * 重入会立即抛出 BorrowError。
 */
export class Host<G, E, I, O> {
  constructor(
    readonly capability: Play<G, E, I, O>,
    private readonly cell: BorrowCell<SharedState<G>>,
  ) {}

  /**
   * 开始一局：返回可逐回合恢复的 coroutine。
   * 已开过局 → ALREADY_STARTED；有事务正在进行 → IN_USE。
   * 成功后立即把 started 置为 true。
   */
  play(): PlayResult<E, I, O> {
    const lease = this.cell.try_acquire('write');
    if (!lease) {
      return {
        ok: false,
        error: play_error('IN_USE', 'game state is being accessed by an open transaction'),
      };
    }

    try {
      const state = lease.get();
      if (state.started) {
        return {
          ok: false,
          error: play_error('ALREADY_STARTED', 'game has already been started on this host'),
        };
      }
      state.started = true;
    } finally {
      lease.release();
    }

    const ctx = new Context(this.clone());
    return { ok: true, coroutine: new Coroutine(this.capability.play(ctx)) };
  }

  /**
   * 快照读取。默认深拷贝（structuredClone），快照与实时状态不共享任何嵌套对象；
   * Play.copy_game 可换成更便宜的拷贝，但同样不得返回实时状态的别名。
   */
  game(): G {
    return this.with_game((game) =>
      this.capability.copy_game ? this.capability.copy_game(game) : structuredClone(game),
    );
  }

  /** 快照读取（深拷贝） */
  clone_game(): G {
    return this.with_game((game) =>
      this.capability.clone_game ? this.capability.clone_game(game) : structuredClone(game),
    );
  }

  /** 在读事务内执行 transact 并返回其结果 */
  with_game<R>(transact: (game: G) => R): R {
    const lease = this.cell.acquire('read');
    try {
      return transact(lease.get().game);
    } finally {
      lease.release();
    }
  }

  /**
   * 在写事务内执行 transact 并返回其结果。
   * 对象状态可就地修改；原始值状态通过 replace 整体替换（事务结束后调用 replace 会抛错）。
   */
  with_game_mut<R>(transact: (game: G, replace: (next: G) => void) => R): R {
    const lease = this.cell.acquire('write');
    try {
      return transact(lease.get().game, (next) => {
        lease.get().game = next;
      });
    } finally {
      lease.release();
    }
  }

  /** 守卫式读事务；调用方负责 release() */
  borrow_game(): GameGuard<G> {
    return new GameGuard(this.cell.acquire('read'));
  }

  /** 守卫式写事务；调用方负责 release() */
  borrow_game_mut(): GameGuardMut<G> {
    return new GameGuardMut(this.cell.acquire('write'));
  }

  /**
   * 在写事务内让 Play 能力对事件作出反应，返回（可能被替换的）事件。
   * 既被 Context.yield_event 调用，也可由外部直接调用以回放远端事件。
   */
  process_event(event: E): E {
    return this.with_game_mut((game) => {
      const handled = this.capability.handle_event?.(game, event);
      return is_replacement<E>(handled) ? handled : event;
    });
  }

  /** 当前游戏状态的规范化哈希，用于比较两次运行或两端回放的结果 */
  state_hash(): string {
    return this.with_game((game) => hash_state(game));
  }

  /** 是否已开局。事务打开期间无法检查，会抛 BorrowError。 */
  get is_started(): boolean {
    const lease = this.cell.try_acquire('read');
    if (!lease) throw new BorrowError('cannot check started flag while a transaction is open');
    try {
      return lease.get().started;
    } finally {
      lease.release();
    }
  }

  /** 是否有事务正在进行（不会开事务） */
  get is_borrowed(): boolean {
    return this.cell.borrowed !== null;
  }

  /** 另一个指向同一 SharedState 的句柄 */
  clone(): Host<G, E, I, O> {
    return new Host(this.capability, this.cell);
  }
}

/**
 * 创建一个 Host 管理一局游戏。initial_game 是开局前的完整状态：
 * 任何准备工作都应在此之前完成，play() 即进入第一回合。
 */
export function create_host<G, E, I, O>(
  capability: Play<G, E, I, O>,
  initial_game: G,
): Host<G, E, I, O> {
  return new Host(capability, new BorrowCell<SharedState<G>>({ started: false, game: initial_game }));
}
