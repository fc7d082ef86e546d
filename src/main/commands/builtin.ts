import { CommandHandlerError } from '../errors.js';
import { launchDetached } from '../system-command.js';
import type { CommandEntry } from './registry.js';
import { removeCommandPhrase } from './sanitize.js';

export type Launcher = (cmd: string, args: string[]) => Promise<boolean>;

export type LaunchSpec = {
  command: string;
  args: string[];
};

export const OPEN_EDGE_PHRASE = 'wiz open edge';

export function edgeLaunchSpec(platform: NodeJS.Platform): LaunchSpec {
  if (platform === 'win32') return { command: 'cmd', args: ['/c', 'start', 'microsoft-edge:'] };
  if (platform === 'darwin') return { command: 'open', args: ['-a', 'Microsoft Edge'] };
  return { command: 'microsoft-edge', args: [] };
}

export function createLaunchCommand(phrase: string, spec: LaunchSpec, launcher: Launcher = launchDetached): CommandEntry {
  return {
    phrase,
    handler: async (transcription) => {
      console.log('[commands] launching', { phrase, command: spec.command });
      const launched = await launcher(spec.command, spec.args);
      if (!launched) throw new CommandHandlerError(`Could not start "${spec.command}" for "${phrase}"`);
      return { executed: true, text: removeCommandPhrase(transcription, phrase) };
    }
  };
}

export function createOpenEdgeCommand(platform: NodeJS.Platform = process.platform, launcher?: Launcher): CommandEntry {
  return createLaunchCommand(OPEN_EDGE_PHRASE, edgeLaunchSpec(platform), launcher);
}
