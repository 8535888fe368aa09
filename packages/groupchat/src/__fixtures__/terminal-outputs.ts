/**
 * Captured-output fixtures for the output cleaner.
 *
 * Each fixture is what an agent's terminal showed after a payload was
 * injected, and the reply that should be posted for it.
 */

export interface OutputFixture {
  name: string;
  description: string;
  payload: string;
  input: string;
  expected: string;
}

export const ANSI = {
  RESET: '\x1b[0m',
  BOLD: '\x1b[1m',
  DIM: '\x1b[2m',
  CYAN: '\x1b[36m',
  CLEAR_LINE: '\x1b[2K',
  CURSOR_RIGHT_3: '\x1b[3C',
};

const PAYLOAD = [
  '[Group Chat] You are "Alice", participants: Alice, Bob. History: /tmp/parley/chat-1.json',
  '2 new message(s) since your last turn. Use the history file as the only source of latest conversation updates.',
  'If you have nothing to add, reply with exactly "[PASS]".',
].join('\n');

export const terminalOutputFixtures: OutputFixture[] = [
  {
    name: 'boxed-reply-with-echo-and-spinner',
    description: 'Echoed prompt, TUI box and a working line around a two-line answer',
    payload: PAYLOAD,
    input: [
      '> [Group Chat] You are "Alice", participants: Alice, Bob. History: /tmp/parley/chat-1.json',
      '  2 new message(s) since your last turn. Use the history file as the only source of latest conversation updates.',
      '  If you have nothing to add, reply with exactly "[PASS]".',
      '',
      '╭──────────────────╮',
      '⏺ The migration plan looks right to me.',
      '  Bob should own the rollback script.',
      '✻ Working (4s • esc to interrupt)',
      '╰──────────────────╯',
      '',
    ].join('\n'),
    expected: '⏺ The migration plan looks right to me.\n  Bob should own the rollback script.',
  },
  {
    name: 'ansi-colored-reply',
    description: 'Reply wrapped in colour codes with a carriage-return redraw of a spinner',
    payload: PAYLOAD,
    input: `${ANSI.CYAN}⠋ thinking\r${ANSI.CLEAR_LINE}${ANSI.RESET}Agreed, ship it on Friday.${ANSI.RESET}\n`,
    expected: 'Agreed, ship it on Friday.',
  },
  {
    name: 'wrapped-echo',
    description: 'Terminal wrapped the long first prompt line across two rows',
    payload: PAYLOAD,
    input: [
      '[Group Chat] You are "Alice", participants: Alice,',
      'Bob. History: /tmp/parley/chat-1.json',
      '2 new message(s) since your last turn. Use the history file as the only source of latest conversation updates.',
      'If you have nothing to add, reply with exactly "[PASS]".',
      'I will take the API review.',
    ].join('\n'),
    expected: 'I will take the API review.',
  },
  {
    name: 'code-fence-untouched',
    description: 'Box characters and spinner glyphs inside a fenced block survive',
    payload: PAYLOAD,
    input: [
      'Here is the layout:',
      '```',
      '┌────┐',
      '│ ok │',
      '└────┘',
      '```',
      '────────',
    ].join('\n'),
    expected: 'Here is the layout:\n```\n┌────┐\n│ ok │\n└────┘\n```',
  },
  {
    name: 'blank-runs-collapsed',
    description: 'Removed status lines leave blank runs that collapse to one',
    payload: PAYLOAD,
    input: ['', 'First point.', '', '⠙', '', '', 'Second point.', '', ''].join('\n'),
    expected: 'First point.\n\nSecond point.',
  },
];
