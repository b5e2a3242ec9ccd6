export * from './daily-message.view';
export * from './daily-modal.view';
export * from './home-tab.view';
