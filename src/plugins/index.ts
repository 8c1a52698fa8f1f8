/**
 * Plugins module exports
 */

export { PluginManager, createPluginManager } from './manager.js';
export type {
  AfterHookCall,
  BeforeHookCall,
  CreatePluginManagerOptions,
  HookPlugin,
  HookSpecNamespace,
  PluginManagerOptions,
} from './manager.js';
