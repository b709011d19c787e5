import { describe, it, expect } from 'vitest';
import type { AgentAdapter } from '@/agents/types.js';
import {
  AgentExecutionError,
  ClassifierParseError,
  SessionAbortedError,
  SessionError,
  TerminationContractViolation,
} from '@/core/errors.js';
import { createHistoryStore } from '@/history/history-store.js';
import type { ChatMessage } from '@/history/types.js';
import { createParticipantRegistry } from '@/participants/participant-registry.js';
import { TEST_CONVERSATION_ID } from '@/testing/fixtures/context.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createTeamConfigs } from '@/testing/fixtures/participants.js';
import { createScriptedAgent } from '@/testing/helpers/scripted-agent.js';
import type { ScriptedAgent, ScriptedReply } from '@/testing/helpers/scripted-agent.js';
import { createScriptedClassifier } from '@/testing/helpers/scripted-classifier.js';
import type { ScriptedVerdict } from '@/testing/helpers/scripted-classifier.js';
import { createTurnController } from './turn-controller.js';
import type { TurnEvent } from './types.js';

// ─── Setup ───────────────────────────────────────────────────────

interface SetupParams {
  selection?: ScriptedVerdict[];
  termination?: ScriptedVerdict[];
  repeatVerdicts?: boolean;
  replies?: Record<string, ScriptedReply[]>;
  beforeReply?: Record<string, () => Promise<void>>;
  maxIterations?: number;
  adapterOverride?: AgentAdapter;
  /** The session's active flag; a fresh active one by default. */
  flag?: { active: boolean };
}

function setup(params: SetupParams = {}) {
  const logger = createMockLogger();
  const registry = createParticipantRegistry({ configs: createTeamConfigs(), logger });
  const history = createHistoryStore([{ author: 'user', content: "What's the diagnosis?" }]);
  const repeat = { repeatLast: params.repeatVerdicts === true };
  const selection = createScriptedClassifier('selection', params.selection ?? [], repeat);
  const termination = createScriptedClassifier('termination', params.termination ?? ['yes'], repeat);
  const events: TurnEvent[] = [];
  const flag = params.flag ?? { active: true };

  const agents = new Map<string, ScriptedAgent>();
  for (const participant of registry.participants) {
    const gate = params.beforeReply?.[participant.name];
    agents.set(
      participant.name,
      createScriptedAgent(
        participant,
        params.replies?.[participant.name],
        gate ? { beforeReply: gate } : undefined,
      ),
    );
  }
  const adapters = new Map<string, AgentAdapter>(agents);
  if (params.adapterOverride) {
    adapters.set(params.adapterOverride.participant.name, params.adapterOverride);
  }

  const controller = createTurnController({
    conversationId: TEST_CONVERSATION_ID,
    registry,
    adapters,
    history,
    selection,
    termination,
    maxIterations: params.maxIterations ?? 30,
    isActive: () => flag.active,
    logger,
    onEvent: (event) => events.push(event),
  });

  return { controller, history, selection, termination, agents, events, logger };
}

/** Alternate between the two specialists, never returning to the facilitator. */
const handOffBetweenSpecialists = (history: readonly ChatMessage[]): string =>
  history.at(-1)?.author === 'Radiology' ? 'ReportCreation' : 'Radiology';

// ─── Tests ───────────────────────────────────────────────────────

describe('createTurnController', () => {
  describe('bootstrap', () => {
    it('lets the facilitator open without a selection call', async () => {
      const { controller, selection } = setup({ termination: ['yes'] });

      const result = await controller.run();

      expect(result).toEqual({
        ok: true,
        value: expect.objectContaining({ state: 'yielded', iterations: 1, speakers: ['Facilitator'] }),
      });
      expect(selection.seen).toHaveLength(0);
    });

    it('applies when several human messages precede any agent turn', async () => {
      const { controller, history, selection } = setup({ termination: ['yes'] });
      history.append({ author: 'user', role: 'human', content: 'It is urgent.' });

      await controller.run();

      expect(selection.seen).toHaveLength(0);
    });
  });

  describe('termination', () => {
    it('shows the termination classifier only the last message', async () => {
      const { controller, termination, history } = setup({ termination: ['yes'] });

      await controller.run();

      expect(termination.seen).toEqual([[history.last()]]);
      expect(history.last()?.author).toBe('Facilitator');
    });

    it('skips the check after non-facilitator turns', async () => {
      const { controller, termination } = setup({
        selection: ['Radiology', 'Facilitator'],
        termination: ['no', 'yes'],
      });

      const result = await controller.run();

      expect(result.ok && result.value.speakers).toEqual(['Facilitator', 'Radiology', 'Facilitator']);
      expect(termination.seen).toHaveLength(2);
    });

    it('normalizes case and whitespace', async () => {
      const { controller } = setup({ termination: ['  YES '] });

      const result = await controller.run();

      expect(result.ok && result.value.state).toBe('yielded');
    });

    it('returns TerminationContractViolation without appending anything more', async () => {
      const { controller, history } = setup({ termination: ['maybe'] });

      const result = await controller.run();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TerminationContractViolation);
        expect(result.error.message).toBe('Termination verdict must be "yes" or "no", got "maybe"');
      }
      expect(history.size).toBe(2);
      expect(controller.state).toBe('failed');
    });
  });

  describe('selection', () => {
    it('falls back to the facilitator for an unknown name and logs it', async () => {
      const { controller, events, logger } = setup({
        selection: ['Dr. Smith'],
        termination: ['no', 'yes'],
      });

      const result = await controller.run();

      expect(result.ok && result.value.speakers).toEqual(['Facilitator', 'Facilitator']);
      expect(events).toContainEqual({
        type: 'speaker_selected',
        participant: 'Facilitator',
        fellBack: true,
        bootstrap: false,
        reasoning: 'scripted',
      });
      expect(logger.warn).toHaveBeenCalledWith(
        'Selection verdict names no participant, falling back to facilitator',
        {
          component: 'turn-controller',
          conversationId: TEST_CONVERSATION_ID,
          verdict: 'Dr. Smith',
          facilitator: 'Facilitator',
        },
      );
    });

    it('does not accept a differently cased name', async () => {
      const { controller } = setup({ selection: ['radiology'], termination: ['no', 'yes'] });

      const result = await controller.run();

      expect(result.ok && result.value.speakers).toEqual(['Facilitator', 'Facilitator']);
    });

    it('gives the selection classifier the full history', async () => {
      const { controller, selection } = setup({
        selection: ['Radiology', 'Facilitator'],
        termination: ['no', 'yes'],
      });

      await controller.run();

      expect(selection.seen[1]?.map((m) => m.author)).toEqual(['user', 'Facilitator', 'Radiology']);
    });

    it('surfaces classifier parse errors', async () => {
      const parseError = new ClassifierParseError('selection', 'not json');
      const { controller } = setup({ selection: [parseError], termination: ['no'] });

      const result = await controller.run();

      expect(result).toEqual({ ok: false, error: parseError });
    });
  });

  describe('iteration ceiling', () => {
    it('halts at exactly 30 turns when the facilitator keeps deferring to itself', async () => {
      const { controller, history, agents } = setup({
        selection: ['Facilitator'],
        termination: ['no'],
        repeatVerdicts: true,
      });

      const result = await controller.run();

      expect(result.ok && result.value.state).toBe('halted');
      expect(result.ok && result.value.iterations).toBe(30);
      expect(history.size).toBe(31);
      expect(agents.get('Facilitator')?.histories).toHaveLength(30);
      expect(controller.state).toBe('halted');
    });

    it('halts when two specialists hand off to each other forever', async () => {
      const { controller, agents, termination } = setup({
        selection: [handOffBetweenSpecialists],
        termination: ['no'],
        repeatVerdicts: true,
      });

      const result = await controller.run();

      expect(result.ok && result.value.state).toBe('halted');
      expect(result.ok && result.value.iterations).toBe(30);
      expect(agents.get('Radiology')?.histories).toHaveLength(15);
      expect(agents.get('ReportCreation')?.histories).toHaveLength(14);
      expect(termination.seen).toHaveLength(1);
    });

    it('honours a configured ceiling', async () => {
      const { controller } = setup({
        selection: ['Radiology'],
        termination: ['no'],
        repeatVerdicts: true,
        maxIterations: 3,
      });

      const result = await controller.run();

      expect(result.ok && result.value).toMatchObject({
        state: 'halted',
        iterations: 3,
        speakers: ['Facilitator', 'Radiology', 'Radiology'],
      });
    });

    it('checks termination before the ceiling', async () => {
      const { controller } = setup({ termination: ['yes'], maxIterations: 1 });

      const result = await controller.run();

      expect(result.ok && result.value.state).toBe('yielded');
    });
  });

  describe('history and publishing', () => {
    it('appends exactly one message per turn with increasing sequence indices', async () => {
      const { controller } = setup({
        selection: ['Radiology', 'Facilitator'],
        termination: ['no', 'yes'],
      });

      const result = await controller.run();

      expect(result.ok && result.value.appended.map((m) => m.sequenceIndex)).toEqual([1, 2, 3]);
    });

    it('publishes every appended message to every adapter', async () => {
      const { controller, agents } = setup({
        selection: ['Radiology', 'Facilitator'],
        termination: ['no', 'yes'],
      });

      const result = await controller.run();

      const appended = result.ok ? result.value.appended : [];
      expect(appended).toHaveLength(3);
      for (const agent of agents.values()) {
        expect(agent.received).toEqual(appended);
      }
    });

    it('emits events in order', async () => {
      const { controller, events } = setup({ termination: ['yes'] });

      await controller.run();

      expect(events.map((e) => e.type)).toEqual([
        'round_start',
        'speaker_selected',
        'message_appended',
        'termination_checked',
        'round_complete',
      ]);
    });
  });

  describe('failures', () => {
    it('surfaces agent failures without appending a partial message', async () => {
      const { controller, history } = setup({
        selection: ['Radiology'],
        termination: ['no'],
        replies: { Radiology: [new Error('imaging service down')] },
      });

      const result = await controller.run();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(AgentExecutionError);
        expect(result.error.message).toBe('Agent "Radiology" failed: imaging service down');
      }
      expect(history.all().map((m) => m.author)).toEqual(['user', 'Facilitator']);
    });

    it('rejects a reply attributed to someone else', async () => {
      const impostor: AgentAdapter = {
        participant: {
          name: 'Facilitator',
          description: 'Leads the discussion and talks to the user',
          isFacilitator: true,
          isSpecialAgent: false,
        },
        receive: () => undefined,
        respond: () => Promise.resolve({ author: 'Radiology', content: 'Hi' }),
      };
      const { controller, history } = setup({ adapterOverride: impostor });

      const result = await controller.run();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          'Agent "Facilitator" failed: response attributed to "Radiology"',
        );
      }
      expect(history.size).toBe(1);
    });

    it('wraps unexpected errors in a HuddleError', async () => {
      const { controller } = setup({ selection: [new Error('boom')], termination: ['no'] });

      const result = await controller.run();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('ROUND_FAILED');
        expect(result.error.message).toBe('boom');
      }
    });
  });

  describe('lifecycle', () => {
    it('resets the iteration count on every run', async () => {
      const { controller, history } = setup({
        selection: ['Radiology', 'Facilitator', 'Facilitator'],
        termination: ['no', 'yes', 'yes'],
      });

      await controller.run();
      expect(controller.iterationCount).toBe(3);

      history.append({ author: 'user', role: 'human', content: 'Thanks, anything else?' });
      const second = await controller.run();

      expect(second.ok && second.value.iterations).toBe(1);
      expect(controller.iterationCount).toBe(1);
    });

    it('rejects a concurrent run', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const { controller } = setup({ beforeReply: { Facilitator: () => gate } });

      const first = controller.run();
      const second = await controller.run();
      release();

      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.error).toBeInstanceOf(SessionError);
        expect(second.error.message).toBe('A round is already running for this conversation');
      }
      expect((await first).ok).toBe(true);
      expect(controller.running).toBe(false);
    });

    it('never appends after the session is deactivated mid-call', async () => {
      const flag = { active: true };
      const { controller, history } = setup({
        flag,
        beforeReply: {
          Facilitator: () => {
            flag.active = false;
            return Promise.resolve();
          },
        },
      });

      const result = await controller.run();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(SessionAbortedError);
      }
      expect(history.size).toBe(1);
    });

    it('stops when the abort signal fires during an agent call', async () => {
      const abort = new AbortController();
      const { controller, history } = setup({
        beforeReply: {
          Facilitator: () => {
            abort.abort();
            return Promise.resolve();
          },
        },
      });

      const result = await controller.run({ abortSignal: abort.signal });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Session "test-conversation" was aborted');
      }
      expect(history.size).toBe(1);
    });
  });
});
