export * from './expressions';
export * from './block-builder';
export * from './module-builder';
export * from './standard-externs';
