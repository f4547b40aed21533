export * from './aladhan-prayer-time.source';
export * from './local-prayer-time.source';
