export * from './gemini-path.util';
export * from './object.util';
export * from './schema.util';
export * from './session.util';
export * from './sse.util';
export * from './stream-parser.util';
export * from './http.util';
