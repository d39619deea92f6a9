export * from './tier';
export * from './proposal';
export * from './review';
export * from './patch';
export * from './errors';
export * from './governance-config';
