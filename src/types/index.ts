export type * from './play.type';
export type * from './run.type';
export type * from './issue.type';
