export * from './runner/runner';
export * from './environment/activation';
export * from './fake/runner';
