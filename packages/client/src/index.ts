export * from './client';
export * from './config';
export * from './errors';
export * from './logging';
export * from './engine/chatEngine';
export * from './engine/eventCoalescer';
export * from './engine/eventQueue';
export * from './engine/keyedDebouncer';
export * from './engine/sessionRouter';
export * from './engine/sessionStateMachine';
export * from './engine/sessionStream';
export * from './http/authApi';
export * from './http/httpClient';
export * from './http/sessionsApi';
export * from './transport/envelope';
export * from './transport/rawEvents';
export * from './transport/socketTransport';
export * from './transport/types';
