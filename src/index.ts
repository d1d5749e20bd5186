export { Host, GameGuard, GameGuardMut, create_host } from './engine/host';
export { Context } from './engine/context';
export { Coroutine } from './engine/coroutine';
export { BorrowCell } from './engine/borrow_cell';
export type { BorrowMode, Lease } from './engine/borrow_cell';
export {
  BorrowError,
  NoDefaultEventError,
  ReplayError,
  RunFinishedError,
  RunReentryError,
  play_error,
} from './engine/errors';
export { drive } from './engine/drive';
export type { DriveOptions } from './engine/drive';
export { replay_events } from './engine/replay';
export type { ReplayResult } from './engine/replay';
export type { Strategy, StrategyContext } from './engine/strategy';
export { constant_strategy, scripted_strategy } from './engine/strategies';
export { canonical_stringify, hash_state } from './utils/canonical.util';
export * from './games';
export type * from './types';
