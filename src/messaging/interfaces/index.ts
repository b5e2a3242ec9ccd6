export * from './incoming-event.interface';
export * from './messaging-service.interface';
export * from './outgoing-message.interface';
