export {
  PusherStateMachine,
  isTerminalPusherState,
  isValidPusherTransition,
  type PusherState,
  type PusherEvent,
  type PusherTransitionResult,
} from './pusher.js';
