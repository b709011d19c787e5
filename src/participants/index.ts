export { createParticipantRegistry } from './participant-registry.js';
export { HUMAN_AUTHOR } from './types.js';
export type { Participant, ParticipantRegistry } from './types.js';
