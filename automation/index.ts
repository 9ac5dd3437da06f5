/**
 * Configuration, deployment and stack event monitoring
 */

export * from './config-manager';
export * from './config-validator';
export { DependencyNode, checkDependencies } from './dependency-resolver';
export * from './deployment-orchestrator';
export * from './notification-channel';
export * from './stack-event-parser';
export * from './stack-event-monitor';
export * from './stack-event-handlers';
export * from './types';
