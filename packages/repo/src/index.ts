export * from './git';
export * from './patch/applier';
export * from './patch/strategies';
