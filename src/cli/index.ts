export { OperatorConsole } from './console';
export type { OperatorConsoleOptions } from './console';
