export * from './cloudcode.constant';
export * from './models.constant';
