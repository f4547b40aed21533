export * from './prayer-time-source.interface';
