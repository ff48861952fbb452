export * from './admin-key.guard';
export * from './api-key.guard';
