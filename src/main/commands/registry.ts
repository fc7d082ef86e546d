import type { AppConfig } from '../config-manager.js';
import { createLaunchCommand, createOpenEdgeCommand, type Launcher } from './builtin.js';
import { sanitizeText } from './sanitize.js';

export type CommandOutcome = {
  executed: boolean;
  text: string;
};

/** Runs the command's side effect against the original transcription and returns the text left to type. */
export type CommandHandler = (transcription: string) => Promise<CommandOutcome>;

export type CommandEntry = {
  phrase: string;
  handler: CommandHandler;
};

/**
 * Ordered phrase → handler table. Iteration follows registration order,
 * which is also the match priority.
 */
export class CommandRegistry {
  private commands = new Map<string, CommandHandler>();

  register(entry: CommandEntry): boolean {
    const phrase = sanitizeText(entry.phrase);
    if (!phrase) {
      console.warn('[commands] ignoring command with empty phrase');
      return false;
    }
    if (this.commands.has(phrase)) {
      console.warn('[commands] duplicate phrase ignored:', phrase);
      return false;
    }
    this.commands.set(phrase, entry.handler);
    return true;
  }

  /** First registered phrase contained in `sanitized`, or null. */
  findFirstMatch(sanitized: string): CommandEntry | null {
    for (const [phrase, handler] of this.commands) {
      if (sanitized.includes(phrase)) return { phrase, handler };
    }
    return null;
  }

  phrases(): string[] {
    return Array.from(this.commands.keys());
  }

  get size(): number {
    return this.commands.size;
  }
}

/** Built-ins first, then `voice_commands` from the config in list order. */
export function createCommandRegistry(config: Pick<AppConfig, 'voice_commands'>, launcher?: Launcher): CommandRegistry {
  const registry = new CommandRegistry();
  registry.register(createOpenEdgeCommand(process.platform, launcher));
  for (const entry of config.voice_commands) {
    registry.register(createLaunchCommand(entry.phrase, { command: entry.command, args: entry.args }, launcher));
  }
  console.debug('[commands] registered', registry.phrases());
  return registry;
}
