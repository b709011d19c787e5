/**
 * Participant Registry: the ordered, validated set of agents that take
 * turns in one session.
 */
import type { ParticipantConfig } from '@/config/types.js';
import { ConfigurationError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import { HUMAN_AUTHOR } from './types.js';
import type { Participant, ParticipantRegistry } from './types.js';

// ─── Registry Dependencies ───────────────────────────────────────

interface RegistryDeps {
  configs: readonly ParticipantConfig[];
  logger: Logger;
}

// ─── Factory Function ────────────────────────────────────────────

/**
 * Build the participant registry for a session.
 *
 * @throws ConfigurationError on an empty list (after background agents are
 *   removed), duplicate or reserved names, or more than one facilitator.
 */
export function createParticipantRegistry(deps: RegistryDeps): ParticipantRegistry {
  const { logger } = deps;

  const active = deps.configs.filter((config) => {
    if (config.kind === 'background') {
      logger.info('Excluding background agent from turn-taking', {
        component: 'participant-registry',
        participant: config.name,
      });
      return false;
    }
    return true;
  });

  if (active.length === 0) {
    throw new ConfigurationError('At least one participant is required', {
      configured: deps.configs.map((c) => c.name),
    });
  }

  const seen = new Set<string>();
  for (const config of active) {
    if (config.name === HUMAN_AUTHOR) {
      throw new ConfigurationError(`Participant name "${HUMAN_AUTHOR}" is reserved for the human`, {
        participant: config.name,
      });
    }
    if (seen.has(config.name)) {
      throw new ConfigurationError(`Duplicate participant name "${config.name}"`, {
        participant: config.name,
      });
    }
    seen.add(config.name);
  }

  const flagged = active.filter((config) => config.facilitator === true);
  if (flagged.length > 1) {
    throw new ConfigurationError('Only one participant may be the facilitator', {
      facilitators: flagged.map((c) => c.name),
    });
  }
  // No flag: the first configured participant facilitates.
  const facilitatorName = flagged[0]?.name ?? active[0]?.name;

  const byName = new Map<string, { participant: Participant; config: ParticipantConfig }>();
  const participants = active.map((config) => {
    const participant: Participant = Object.freeze({
      name: config.name,
      description: config.description,
      isFacilitator: config.name === facilitatorName,
      isSpecialAgent: config.kind === 'special',
    });
    byName.set(config.name, { participant, config });
    return participant;
  });

  const facilitator = participants.find((p) => p.isFacilitator);
  if (!facilitator) {
    throw new ConfigurationError('No facilitator could be resolved');
  }

  logger.debug('Participant registry ready', {
    component: 'participant-registry',
    participants: participants.map((p) => p.name),
    facilitator: facilitator.name,
  });

  return {
    participants: Object.freeze(participants),
    facilitator,

    get(name: string): Participant | undefined {
      return byName.get(name)?.participant;
    },

    has(name: string): boolean {
      return byName.has(name);
    },

    names(): string[] {
      return participants.map((p) => p.name);
    },

    configFor(name: string): ParticipantConfig | undefined {
      return byName.get(name)?.config;
    },
  };
}
