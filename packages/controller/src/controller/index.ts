export { ServerController } from './server-controller';
export type { ServerControllerOptions } from './server-controller';
export {
  SERVER_DELETED_EVENT,
  SERVER_PHASE_EVENT,
  isServerDeletedEvent,
  isServerPhaseEvent
} from './events';
export type { ServerDeletedEvent, ServerPhaseEvent } from './events';
export { KeyedMutex } from './keyed-mutex';
export { foldActivity, statusEquals, transitionStatus } from './status';
export type { PhaseChange } from './status';
