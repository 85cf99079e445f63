// packages/core/src/engine -- Analysis controller and its retry state machine

export { AnalysisController } from './analysis-controller.js';
export type {
  AnalysisControllerOptions,
  AnalysisRequest,
  ControllerSettings,
} from './analysis-controller.js';
export {
  afterCall,
  afterWait,
  begin,
  isTerminal,
  toOutcome,
  waitSecondsFor,
} from './backoff.js';
export type {
  AttemptingState,
  BackoffPolicy,
  BlockedState,
  CallSignal,
  ExhaustedState,
  FailedState,
  IdleState,
  RetryState,
  RetryWaitState,
  SucceededState,
  TerminalState,
} from './backoff.js';
export { classifyError } from './classify.js';
export type { ErrorKind } from './classify.js';
export { EventBus } from './event-bus.js';
export { createCountdownWaiter, sleep } from './waiter.js';
export type { Waiter } from './waiter.js';
