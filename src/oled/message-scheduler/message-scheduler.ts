/**
 * Message Scheduler Implementation
 *
 * Decides when the LUNA message is due for a refresh and which prompt
 * category to ask for. Provider failures never leave this module: they are
 * turned into a fallback outcome picked from a fixed phrase list.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import {
  PromptCategory,
  type MessageOutcome,
  type MessageProvider,
  type MessageState,
} from '../types/index.js';

const log = createSubsystemLogger('oled/scheduler');

/** Minimum wall-clock time between two refreshes */
export const REFRESH_INTERVAL_MS = 5 * 60 * 1000;

/** Each category is active for this many minutes of the hour */
export const CATEGORY_WINDOW_MINUTES = 15;

export const INITIAL_MESSAGE = 'Initializing...';

export const FALLBACK_MESSAGES: readonly string[] = [
  'Monitoring systems...',
  'All systems nominal.',
  'Standing by.',
  'Ready to assist.',
];

export interface GenerationSettings {
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_GENERATION: GenerationSettings = {
  temperature: 0.9,
  maxTokens: 50,
};

const SENTENCE_LIMIT = '(1 short sentence, max 25 words)';

/**
 * True once at least REFRESH_INTERVAL_MS have passed since the last refresh.
 * A message that was never refreshed is always due.
 */
export function shouldRefresh(now: Date, lastRefreshedAt: Date | null): boolean {
  if (lastRefreshedAt === null) {
    return true;
  }
  return now.getTime() - lastRefreshedAt.getTime() >= REFRESH_INTERVAL_MS;
}

/**
 * Category for the quarter of the hour `now` falls in
 */
export function promptCategory(now: Date): PromptCategory {
  const index = Math.floor(now.getMinutes() / CATEGORY_WINDOW_MINUTES) % 4;
  switch (index) {
    case 0:
      return PromptCategory.Status;
    case 1:
      return PromptCategory.Greeting;
    case 2:
      return PromptCategory.Mood;
    default:
      return PromptCategory.Fact;
  }
}

function partOfDay(hour: number): 'morning' | 'afternoon' | 'evening' {
  if (hour < 12) return 'morning';
  if (hour < 18) return 'afternoon';
  return 'evening';
}

/**
 * Prompt text sent to the model for a category. Greetings follow the local
 * hour of `now`.
 */
export function buildPrompt(category: PromptCategory, now: Date): string {
  switch (category) {
    case PromptCategory.Status:
      return `Write a brief status update from an AI assistant named LUNA ${SENTENCE_LIMIT}.`;
    case PromptCategory.Greeting:
      return `Write a brief good ${partOfDay(now.getHours())} greeting from LUNA ${SENTENCE_LIMIT}.`;
    case PromptCategory.Mood:
      return `Write a brief quirky comment about LUNA's mood as an AI ${SENTENCE_LIMIT}.`;
    case PromptCategory.Fact:
      return `Share one brief interesting tech fact from LUNA ${SENTENCE_LIMIT}.`;
  }
}

/**
 * Fallback phrase for the current minute; stable within a minute.
 */
export function selectFallback(now: Date): string {
  return FALLBACK_MESSAGES[now.getMinutes() % FALLBACK_MESSAGES.length];
}

export interface MessageSchedulerOptions extends Partial<GenerationSettings> {
  /** Wall clock read once the provider settles; replaced in tests */
  clock?: () => Date;
}

export class MessageScheduler extends EventEmitter {
  private provider: MessageProvider;
  private generation: GenerationSettings;
  private clock: () => Date;
  private state: MessageState;

  constructor(provider: MessageProvider, options: MessageSchedulerOptions = {}) {
    super();
    const { clock, ...generation } = options;
    this.provider = provider;
    this.generation = { ...DEFAULT_GENERATION, ...generation };
    this.clock = clock ?? (() => new Date());
    this.state = {
      currentText: INITIAL_MESSAGE,
      lastRefreshedAt: null,
      promptCategory: PromptCategory.Status,
    };
  }

  /**
   * Gets a copy of the current message state
   */
  getState(): MessageState {
    return { ...this.state };
  }

  getCurrentText(): string {
    return this.state.currentText;
  }

  /**
   * Refreshes the message when it is due, otherwise resolves with null
   */
  async refreshIfDue(now: Date): Promise<MessageOutcome | null> {
    if (!shouldRefresh(now, this.state.lastRefreshedAt)) {
      return null;
    }
    return this.refresh(now);
  }

  /**
   * Asks the provider for a new message in the category current at `now`.
   * The fallback phrase and the refresh time come from the clock read after
   * the provider settles. Never rejects.
   */
  async refresh(now: Date): Promise<MessageOutcome> {
    const category = promptCategory(now);
    const prompt = buildPrompt(category, now);

    let outcome: MessageOutcome;
    try {
      const text = await this.provider.generate({
        prompt,
        temperature: this.generation.temperature,
        maxTokens: this.generation.maxTokens,
      });
      outcome = { origin: 'provider', text, category, refreshedAt: this.clock() };
    } catch (error) {
      const settledAt = this.clock();
      outcome = {
        origin: 'fallback',
        text: selectFallback(settledAt),
        category,
        refreshedAt: settledAt,
        reason: describeError(error),
      };
    }

    this.state = {
      currentText: outcome.text,
      lastRefreshedAt: outcome.refreshedAt,
      promptCategory: category,
    };

    if (outcome.origin === 'provider') {
      log.info('LUNA message refreshed', { category: PromptCategory[category], length: outcome.text.length });
      this.emit('messageRefreshed', outcome);
    } else {
      log.warn('Message provider unavailable, using fallback', {
        category: PromptCategory[category],
        reason: outcome.reason,
        fallback: outcome.text,
      });
      this.emit('messageFallback', outcome);
    }

    return outcome;
  }
}
