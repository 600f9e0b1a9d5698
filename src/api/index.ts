export * from './giveaway';
