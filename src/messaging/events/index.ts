export * from './app-home-opened.event';
export * from './block-action-received.event';
export * from './command-received.event';
export * from './view-submitted.event';
