export { createProgram, runCli, createServeCommand, createSpidersCommand } from './cli.js';
export * from './formatter.js';
