export * from './credentials.interface';
