export const name = '@faultline/cli';

export { createProgram, exitCodeFor, main, reportError } from './program';
export type { GlobalOptions } from './program';
export { OutputRenderer } from './output/renderer';
