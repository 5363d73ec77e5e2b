/**
 * Core tools package index
 */

export * from './interfaces/Tool';
export * from './registry';
export * from './interceptors';
export * from './shell/BashTool/BashTool';
export * from './filesystem/TextEditorTool/TextEditorTool';
