export * from './adapter';
export * from './channel';
export * from './config';
export * from './connection';
export * from './continue';
export * from './errors';
export * from './executor';
export * from './invoker';
export * from './logger';
export * from './request';
export * from './response';
export * from './responses';
export * from './server';
export * from './stream';
export * from './writer';
