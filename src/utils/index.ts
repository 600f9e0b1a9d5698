export * from './normalize';
export * from './validate';
export * from './aggregate';
export * from './random';
export * from './sampler';
export * from './stats';
export * from './hash';
export * from './parser';
export * from './export';
export * from './errors';
