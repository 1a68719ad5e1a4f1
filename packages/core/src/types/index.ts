export * from './channel';
export * from './pricing';
