export * from './env.validation';
export * from './app.config';
