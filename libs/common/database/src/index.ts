export * from './database.module';
export * from './database.service';
export * from './pg-errors';
export * from './with-transaction';
