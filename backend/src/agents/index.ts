// Assistant Layer Exports
export { AssistantOrchestrator, createOrchestrator } from './orchestrator.js';
export type { OrchestratorDependencies, StartSessionResult } from './orchestrator.js';
export { SessionController, GREETING, FAREWELL, FALLBACK_REPLY, isFarewell } from './sessionController.js';
export { SessionRegistry, isTerminal } from './sessionRegistry.js';
export { CommandRouter, ROUTE_TABLE, matchDirective } from './commandRouter.js';
export { CommandProcessor } from './commandProcessor.js';
export { BackgroundTaskScheduler } from './backgroundTasks.js';
export { RetryPolicy } from './retryPolicy.js';
export { findMeetingSlots, getFreeSlots, mergeIntervals, rangesOverlap, NO_SLOTS } from './schedulingEngine.js';
