export * from './EngineConfig';
export { ConfigStore } from './ConfigStore';
export { loadEngineConfig } from './loadEngineConfig';
