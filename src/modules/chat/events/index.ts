export * from './chat.events';
