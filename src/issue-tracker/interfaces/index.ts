export * from './issue-tracker.interface';
