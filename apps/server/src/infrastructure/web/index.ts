/**
 * Web Infrastructure Exports
 */

export { HTTPServer } from './HTTPServer';
export type { HTTPServerConfig, HTTPServerDependencies, ServerInfo } from './HTTPServer';
export { NoticeBoard } from './NoticeBoard';
export type { Notice } from './NoticeBoard';

export * from './api';
