/**
 * Public API. `main.ts` is the command-line entry point; everything a host
 * program needs to assemble its own sessions is exported here.
 *
 * @module tandem
 */

export * from './sections';
export * from './capabilities';
export * from './watchers';
export * from './agent';
export * from './llm';
export * from './tools';
export * from './mcp';
export * from './config';
export * from './cli';
export * from './utils';
export { App, createSession, sessionSpecs } from './app';
export type { AppOptions, Session, SessionSpec } from './app';
export { VERSION } from './version';
