export type * from './issue.type';
export type * from './compile.type';
export type * from './collaborator.type';
export type * from './run.type';
