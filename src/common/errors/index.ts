export * from './gateway.errors';
