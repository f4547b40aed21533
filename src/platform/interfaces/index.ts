export * from './command-runner.interface';
export * from './platform-actions.interface';
