export { createLogger, setLogLevel } from './logger';
export type { Logger } from './logger';
