import { describe, expect, it, vi } from 'vitest';
import { sanitizeText, removeCommandPhrase } from '../commands/sanitize.js';
import { CommandRegistry, createCommandRegistry } from '../commands/registry.js';
import { CommandProcessor } from '../commands/processor.js';
import { OPEN_EDGE_PHRASE, createOpenEdgeCommand, edgeLaunchSpec } from '../commands/builtin.js';

describe('sanitizeText', () => {
  it('lowercases, replaces punctuation with spaces and collapses whitespace', () => {
    expect(sanitizeText('  Wiz, open   Edge!  ')).toBe('wiz open edge');
  });

  it('keeps letters, digits and underscores from any script', () => {
    expect(sanitizeText('Héllo—World_1')).toBe('héllo world_1');
  });
});

describe('removeCommandPhrase', () => {
  it('removes the phrase case-insensitively across any whitespace', () => {
    expect(removeCommandPhrase('Please WIZ   open edge now', 'wiz open edge')).toBe('Please  now');
  });

  it('returns an empty string when the phrase was the whole text', () => {
    expect(removeCommandPhrase('Wiz open Edge', OPEN_EDGE_PHRASE)).toBe('');
  });
});

describe('CommandRegistry', () => {
  it('rejects empty and duplicate phrases, keeping the first', async () => {
    const registry = new CommandRegistry();
    const first = vi.fn(async () => ({ executed: true, text: 'first' }));
    const second = vi.fn(async () => ({ executed: true, text: 'second' }));

    expect(registry.register({ phrase: 'Wiz open edge', handler: first })).toBe(true);
    expect(registry.register({ phrase: 'wiz, open edge!', handler: second })).toBe(false);
    expect(registry.register({ phrase: ' ?! ', handler: second })).toBe(false);
    expect(registry.phrases()).toEqual(['wiz open edge']);

    const match = registry.findFirstMatch('wiz open edge');
    await match?.handler('x');
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).not.toHaveBeenCalled();
  });

  it('registers the built-in command before configured voice commands', () => {
    const registry = createCommandRegistry({
      voice_commands: [
        { phrase: 'Open Terminal', command: 'xterm', args: [] },
        { phrase: 'open notes', command: 'gedit', args: ['notes.txt'] }
      ]
    });
    expect(registry.phrases()).toEqual([OPEN_EDGE_PHRASE, 'open terminal', 'open notes']);
  });
});

describe('CommandProcessor', () => {
  it('executes only the first registered phrase that matches', async () => {
    const registry = new CommandRegistry();
    const openEdge = vi.fn(async (text: string) => ({ executed: true, text: removeCommandPhrase(text, 'wiz open edge') }));
    const open = vi.fn(async () => ({ executed: true, text: 'should not run' }));
    registry.register({ phrase: 'wiz open edge', handler: openEdge });
    registry.register({ phrase: 'wiz open', handler: open });

    const result = await new CommandProcessor(registry).execute('Wiz, open Edge, please.');

    expect(openEdge).toHaveBeenCalledTimes(1);
    expect(openEdge).toHaveBeenCalledWith('Wiz, open Edge, please.');
    expect(open).not.toHaveBeenCalled();
    expect(result.executed).toBe(true);
  });

  it('hands the handler the original text and returns its remainder', async () => {
    const launcher = vi.fn(async () => true);
    const registry = new CommandRegistry();
    registry.register(createOpenEdgeCommand('linux', launcher));

    const result = await new CommandProcessor(registry).execute('Wiz open edge, please.');

    expect(launcher).toHaveBeenCalledWith('microsoft-edge', []);
    expect(result).toEqual({ executed: true, text: ', please.' });
  });

  it('returns the original text unchanged when the launch fails', async () => {
    const launcher = vi.fn(async () => false);
    const registry = new CommandRegistry();
    registry.register(createOpenEdgeCommand('linux', launcher));

    const result = await new CommandProcessor(registry).execute('Wiz open edge now.');

    expect(launcher).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ executed: false, text: 'Wiz open edge now.' });
  });

  it('returns the original text unchanged when a handler throws', async () => {
    const registry = new CommandRegistry();
    registry.register({
      phrase: 'do the thing',
      handler: async () => {
        throw new Error('boom');
      }
    });

    const result = await new CommandProcessor(registry).execute('Do the thing!');
    expect(result).toEqual({ executed: false, text: 'Do the thing!' });
  });

  it('treats a handler that reports failure as not executed', async () => {
    const registry = new CommandRegistry();
    registry.register({ phrase: 'do the thing', handler: async () => ({ executed: false, text: 'changed' }) });

    const result = await new CommandProcessor(registry).execute('do the thing');
    expect(result).toEqual({ executed: false, text: 'do the thing' });
  });

  it('passes text through when nothing matches', async () => {
    const handler = vi.fn(async () => ({ executed: true, text: '' }));
    const registry = new CommandRegistry();
    registry.register({ phrase: 'wiz open edge', handler });

    const result = await new CommandProcessor(registry).execute('Open the edge of the wizard.');

    expect(handler).not.toHaveBeenCalled();
    expect(result).toEqual({ executed: false, text: 'Open the edge of the wizard.' });
  });
});

describe('edgeLaunchSpec', () => {
  it('picks a launcher per platform', () => {
    expect(edgeLaunchSpec('win32')).toEqual({ command: 'cmd', args: ['/c', 'start', 'microsoft-edge:'] });
    expect(edgeLaunchSpec('darwin')).toEqual({ command: 'open', args: ['-a', 'Microsoft Edge'] });
    expect(edgeLaunchSpec('linux')).toEqual({ command: 'microsoft-edge', args: [] });
  });
});
