export * from './error-codes';
export * from './chirpy-error';
export * from './chirpy-error.filter';
export * from './errors-factory';
