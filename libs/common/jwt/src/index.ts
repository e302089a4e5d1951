export * from './jwt.module';
export * from './jwt.service';
export * from './jwt.types';
