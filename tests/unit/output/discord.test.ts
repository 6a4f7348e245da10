/**
 * Operator Bot Command Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { OPERATOR_COMMANDS, handleCommand, type CommandHandlers } from '../../../src/output/discord.js';

function handlers(overrides: Partial<CommandHandlers> = {}): CommandHandlers {
  return {
    status: vi.fn(async () => 'status text'),
    scan: vi.fn(async () => 'scan text'),
    rescan: vi.fn(async () => 'rescan text'),
    ...overrides,
  };
}

describe('OPERATOR_COMMANDS', () => {
  it('should register status, scan and rescan', () => {
    expect(OPERATOR_COMMANDS.map(command => command.name)).toEqual(['status', 'scan', 'rescan']);
  });
});

describe('handleCommand', () => {
  it('should route to the matching handler', async () => {
    const h = handlers();

    expect(await handleCommand('rescan', h)).toBe('rescan text');
    expect(h.rescan).toHaveBeenCalledTimes(1);
    expect(h.status).not.toHaveBeenCalled();
  });

  it('should reply to unknown commands without calling handlers', async () => {
    const h = handlers();
    expect(await handleCommand('boxoffice', h)).toBe('Unknown command');
    expect(h.scan).not.toHaveBeenCalled();
  });

  it('should turn a failing handler into an error reply', async () => {
    const h = handlers({
      status: async () => {
        throw new Error('state unavailable');
      },
    });
    expect(await handleCommand('status', h)).toBe('Error: state unavailable');
  });

  it('should fit replies into one Discord message', async () => {
    const reply = await handleCommand('status', handlers({ status: async () => 'x'.repeat(5000) }));
    expect(reply).toHaveLength(2000);
    expect(reply.endsWith('...')).toBe(true);
  });
});
