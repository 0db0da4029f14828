export * from './config/loader';
export * from './cost/signature';
export * from './cost/oracle';
export * from './cache/memory-store';
export * from './cache/record';
export * from './cache/jsonl-store';
export * from './cache/cost-cache';
export * from './select/selector';
export * from './range/candidate-range';
export * from './driver/verdict';
export * from './driver/driver';
