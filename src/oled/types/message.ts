/**
 * Message Types
 *
 * Prompt categories, scheduler state and refresh outcomes for the rotating
 * LUNA message line.
 */

export enum PromptCategory {
  Status = 0,
  Greeting = 1,
  Mood = 2,
  Fact = 3,
}

export interface MessageState {
  /** Text currently shown on the message line */
  currentText: string;
  /** Wall-clock time of the last refresh; null until the first one */
  lastRefreshedAt: Date | null;
  /** Category locked in by the last refresh */
  promptCategory: PromptCategory;
}

export interface MessageRequest {
  prompt: string;
  temperature: number;
  maxTokens: number;
}

export type MessageOutcome =
  | {
      origin: 'provider';
      text: string;
      category: PromptCategory;
      refreshedAt: Date;
    }
  | {
      origin: 'fallback';
      text: string;
      category: PromptCategory;
      refreshedAt: Date;
      /** Why the provider result was not used */
      reason: string;
    };

export interface MessageProvider {
  /** Resolves with a short message or rejects when the model is unavailable */
  generate(request: MessageRequest): Promise<string>;
}
