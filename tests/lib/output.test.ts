import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { Command } from 'commander';
import { getGlobalOptions, maskSecret, printError, printSuccess, runCommand } from '../../src/lib/output.js';
import { NotAuthenticatedError, PremiumRequiredError } from '../../src/lib/errors.js';

describe('output', () => {
  let logSpy: MockInstance;
  let errorSpy: MockInstance;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  describe('printSuccess', () => {
    it('should wrap data in a success envelope', () => {
      printSuccess('json', { volume: 40 });

      expect(logSpy).toHaveBeenCalledWith(JSON.stringify({ success: true, volume: 40 }, null, 2));
    });

    it('should run the table renderer in table mode', () => {
      const renderer = vi.fn();

      printSuccess('table', { volume: 40 }, renderer);

      expect(renderer).toHaveBeenCalledOnce();
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should print JSON in table mode when there is no renderer', () => {
      printSuccess('table', { ok: 1 });

      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({ success: true, ok: 1 });
    });
  });

  describe('printError', () => {
    it('should print the error envelope and set the exit code', () => {
      printError('json', new PremiumRequiredError());

      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
        success: false,
        error: { code: 'PREMIUM_REQUIRED', message: 'Spotify Premium is required for playback control' },
      });
      expect(process.exitCode).toBe(2);
    });

    it('should write plain text to stderr in table mode', () => {
      printError('table', new NotAuthenticatedError());

      expect(errorSpy).toHaveBeenCalledWith('Error: Not logged in to Spotify');
      expect(logSpy).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(3);
    });
  });

  describe('runCommand', () => {
    it('should pass the global options and catch failures', async () => {
      const program = new Command().option('-f, --format <format>', 'format', 'json').option('-q, --quiet');
      let seen: unknown;
      program.command('probe').action(async (_options, cmd: Command) => {
        await runCommand(cmd, (options) => {
          seen = options;
          throw new NotAuthenticatedError();
        });
      });

      await program.parseAsync(['node', 'spdeck', '-f', 'table', '-q', 'probe']);

      expect(seen).toEqual({ format: 'table', quiet: true, verbose: false });
      expect(errorSpy).toHaveBeenCalledWith('Error: Not logged in to Spotify');
      expect(process.exitCode).toBe(3);
    });

    it('should default to JSON for unknown formats', () => {
      const program = new Command().option('-f, --format <format>', 'format', 'json');
      program.parse(['node', 'spdeck', '-f', 'yaml']);

      expect(getGlobalOptions(program).format).toBe('json');
    });
  });

  describe('maskSecret', () => {
    it.each([
      ['abc', '****'],
      ['abcd', '****'],
      ['abcdefgh', '****efgh'],
      ['0123456789abcdefghij', '************ghij'],
    ])('should mask %s as %s', (value, masked) => {
      expect(maskSecret(value)).toBe(masked);
    });
  });
});
