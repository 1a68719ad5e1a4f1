// Types
export * from './types';
export * from './errors';

// Services
export * from './services/pricing-engine';
export * from './services/channel-calculators';
export * from './services/calculator-factory';
export * from './services/policy-loader';
export * from './services/validation';
export * from './services/quote-service';
