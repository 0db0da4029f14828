export * from './runner/runner';
export * from './command/parser';
export * from './build/plan';
export * from './build/invoker';
