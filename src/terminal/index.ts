export * from './types';
export * from './keys';
export { createNodeTerminal, type NodeInput, type NodeOutput, type NodeTerminalOptions } from './node';
export { createXtermTerminal, type XtermHost } from './xterm';
