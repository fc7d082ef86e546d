import { CommandHandlerError, errorMessage } from '../errors.js';
import type { CommandOutcome, CommandRegistry } from './registry.js';
import { sanitizeText } from './sanitize.js';

/**
 * Detects and runs at most one voice command per transcription.
 *
 * Matching is first-match on substring of the sanitized text, in
 * registration order. The handler sees the original text so the remainder
 * keeps its punctuation and case. A failing handler leaves the text as it
 * came in.
 */
export class CommandProcessor {
  constructor(private readonly registry: CommandRegistry) {}

  async execute(rawText: string): Promise<CommandOutcome> {
    const sanitized = sanitizeText(rawText);
    if (!sanitized) return { executed: false, text: rawText };

    const match = this.registry.findFirstMatch(sanitized);
    if (!match) return { executed: false, text: rawText };

    console.log('[commands] command detected:', match.phrase);
    try {
      const outcome = await match.handler(rawText);
      if (!outcome.executed) {
        console.warn('[commands] command reported failure:', match.phrase);
        return { executed: false, text: rawText };
      }
      return { executed: true, text: outcome.text };
    } catch (err) {
      const error =
        err instanceof CommandHandlerError
          ? err
          : new CommandHandlerError(`Command "${match.phrase}" failed: ${errorMessage(err)}`, { cause: err });
      console.error('[commands]', error.message);
      return { executed: false, text: rawText };
    }
  }
}
