export type {
  ControllerState,
  RoundEndState,
  RoundOutcome,
  RunOptions,
  TurnController,
  TurnControllerDeps,
  TurnEvent,
  TurnEventHandler,
} from './types.js';
export { createTurnController } from './turn-controller.js';
export { createGroupChatSession } from './session.js';
export type {
  ClassifierFactory,
  ClassifierPair,
  ConversationContext,
  GroupChatSession,
  GroupChatSessionOptions,
  SessionState,
} from './session.js';
