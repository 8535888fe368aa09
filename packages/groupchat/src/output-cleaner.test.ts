import { describe, it, expect } from 'vitest';
import {
  cleanCapturedOutput,
  isPassSignal,
  normalizeTerminalText,
  stripAnsi,
  stripLineMarkers,
} from './output-cleaner.js';
import { terminalOutputFixtures } from './__fixtures__/terminal-outputs.js';

describe('stripAnsi', () => {
  it('removes colour codes', () => {
    expect(stripAnsi('\x1b[32mgreen\x1b[0m text')).toBe('green text');
  });

  it('turns cursor-forward moves into spaces', () => {
    expect(stripAnsi('a\x1b[3Cb')).toBe('a   b');
    expect(stripAnsi('a\x1b[Cb')).toBe('a b');
  });

  it('removes OSC title sequences', () => {
    expect(stripAnsi('\x1b]0;window title\x07hello')).toBe('hello');
  });

  it('keeps bracketed words that are not escape remnants', () => {
    expect(stripAnsi('[Agent] ready')).toBe('[Agent] ready');
    expect(stripAnsi('[2K[1Ahello')).toBe('hello');
  });
});

describe('normalizeTerminalText', () => {
  it('keeps only text after the last carriage return on each line', () => {
    expect(normalizeTerminalText('loading 10%\rloading 90%\rdone\nnext')).toBe('done\nnext');
  });

  it('treats CRLF as a plain newline and trims trailing spaces', () => {
    expect(normalizeTerminalText('one   \r\ntwo\r\n')).toBe('one\ntwo\n');
  });

  it('ignores a trailing carriage return', () => {
    expect(normalizeTerminalText('answer\r')).toBe('answer');
  });
});

describe('stripLineMarkers', () => {
  it('removes quote, bullet and border markers', () => {
    expect(stripLineMarkers('  > ⏺ hello │')).toBe('hello');
    expect(stripLineMarkers('• item')).toBe('item');
  });
});

describe('isPassSignal', () => {
  it.each([
    ['[PASS]'],
    ['[pass]'],
    ['PASS'],
    ['  pass  '],
    ['⏺ [PASS]'],
    ['> [Pass]'],
    ['Nothing to add from me.\n\n[PASS]'],
  ])('accepts %j', text => {
    expect(isPassSignal(text, '[PASS]')).toBe(true);
  });

  it.each([
    [''],
    ['I pass the ball to Bob'],
    ['[PASS] but here is a thought'],
    ['PASSING'],
  ])('rejects %j', text => {
    expect(isPassSignal(text, '[PASS]')).toBe(false);
  });

  it('honours a custom keyword', () => {
    expect(isPassSignal('skip', '[SKIP]')).toBe(true);
    expect(isPassSignal('[PASS]', '[SKIP]')).toBe(false);
  });
});

describe('cleanCapturedOutput', () => {
  it('returns the canonical token when the last line is a pass', () => {
    const raw = '> some echoed prompt\n✻ Working (2s • esc to interrupt)\n⏺ pass\n\n';
    expect(cleanCapturedOutput(raw, { passKeyword: '[PASS]' })).toBe('[PASS]');
  });

  it('is idempotent on the pass token', () => {
    const once = cleanCapturedOutput('[pass]', { passKeyword: '[PASS]' });
    expect(once).toBe('[PASS]');
    expect(cleanCapturedOutput(once, { passKeyword: '[PASS]' })).toBe('[PASS]');
  });

  it('returns an empty string when only chrome and status remain', () => {
    const raw = '╭────╮\n⠋\n✻ Working (1s • esc to interrupt)\n╰────╯\n';
    expect(cleanCapturedOutput(raw)).toBe('');
  });

  it('drops lines that repeat the payload outside the echo block', () => {
    const payload = 'Header line for the agent\nRead the transcript before answering.';
    const raw = 'Read the transcript before answering.\nSure, reading it now.';
    expect(cleanCapturedOutput(raw, { payload })).toBe('Sure, reading it now.');
  });

  it('removes only the signature line when the echo has no end marker', () => {
    const payload = 'Header line for the agent\nRead the transcript before answering.';
    const raw = '> Header line for the agent\nMy actual reply.';
    expect(cleanCapturedOutput(raw, { payload })).toBe('My actual reply.');
  });

  it('leaves text alone when no payload is given', () => {
    expect(cleanCapturedOutput('plain answer')).toBe('plain answer');
  });

  describe('fixtures', () => {
    it.each(terminalOutputFixtures.map(f => [f.name, f] as const))('%s', (_name, fixture) => {
      expect(cleanCapturedOutput(fixture.input, { payload: fixture.payload, passKeyword: '[PASS]' })).toBe(
        fixture.expected
      );
    });
  });
});
