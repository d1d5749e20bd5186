/**
 * 单线程的独占访问单元（fail-fast）。
 *
 * 同一时刻最多一个租约（读写一视同仁）；已被持有时：
 *  - try_acquire 返回 null（供 play() 判断 IN_USE）
 *  - acquire 直接抛 BorrowError
 * 从不阻塞、从不排队。
 */
import { BorrowError } from './errors';

export type BorrowMode = 'read' | 'write';

/** 一次事务的租约。release 之后再 get 会抛错；重复 release 无副作用。 */
export interface Lease<T> {
  readonly mode: BorrowMode;
  readonly released: boolean;
  get(): T;
  release(): void;
}

export class BorrowCell<T> {
  private held: BorrowMode | null = null;

  constructor(private readonly content: T) {}

  /** 当前打开的事务类型；没有则为 null */
  get borrowed(): BorrowMode | null {
    return this.held;
  }

  try_acquire(mode: BorrowMode): Lease<T> | null {
    if (this.held) return null;
    this.held = mode;

    let released = false;
    const content = this.content;
    const release_cell = () => {
      this.held = null;
    };

    return {
      mode,
      get released() {
        return released;
      },
      get(): T {
        if (released) throw new BorrowError(`${mode} transaction has already been released`);
        return content;
      },
      release() {
        if (released) return;
        released = true;
        release_cell();
      },
    };
  }

  acquire(mode: BorrowMode): Lease<T> {
    const lease = this.try_acquire(mode);
    if (!lease) {
      throw new BorrowError(
        `cannot open a ${mode} transaction while a ${this.held} transaction is open`,
      );
    }
    return lease;
  }
}
