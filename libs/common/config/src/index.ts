import configuration from './configuration';

export default configuration;
export * from './configuration';
export * from './config.module';
export * from './require-config';
