export * from './cloudcode-request.interface';
export * from './cloudcode-response.interface';
export * from './load-code-assist.interface';
