/**
 * Turns raw captured terminal text into the reply a participant actually wrote.
 *
 * TUIs echo the injected prompt, draw boxes, and print spinners and status
 * lines around the real answer. Filtering is line oriented and never touches
 * fenced code blocks.
 */

import { DEFAULT_PASS_KEYWORD } from '@parley/config';

// Quote, bullet and box-border prefixes that TUIs put in front of lines
const LEADING_MARKERS = /^[\s>›»❯│┃|•●◦‣⁃⏺◆◇○□■*-]+/u;
const TRAILING_MARKERS = /[\s│┃]+$/u;

// Box-drawing and block elements, optionally around an empty input caret
const CHROME_LINE = /^[\s─-▟>›❯]*$/u;
const HAS_CHROME_CHAR = /[─-▟]/u;

const STATUS_PATTERNS = [
  /\bworking\s*\(\s*\d+\s*s/i,
  /\besc to (?:interrupt|cancel)\b/i,
];
// Braille spinners plus the star/dot glyphs CLI agents animate with
const SPINNER_ONLY = /^[\s⠀-⣿✻✽✶✳✢·◐◓◑◒◴◵◶◷]+$/u;

const FENCE = /^\s*(```|~~~)/;

/** Minimum length for a partial (wrapped) line to count as an echo */
const MIN_FRAGMENT_LENGTH = 12;
/** Extra lines tolerated between the echo's first and last line */
const ECHO_SPAN_SLACK = 24;

/**
 * Strip ANSI escape sequences from terminal output.
 * Cursor-forward moves become spaces so column-aligned text keeps its gaps.
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  let result = str.replace(/\x1B\[(\d+)C/g, (_m, n: string) => ' '.repeat(parseInt(n, 10) || 1));

  // eslint-disable-next-line no-control-regex
  result = result.replace(/\x1B\[C/g, ' ');

  // Strip CSI, OSC and two-byte escapes
  // eslint-disable-next-line no-control-regex
  result = result.replace(/\x1B(?:\[[0-9;?]*[A-Za-z]|\].*?(?:\x07|\x1B\\)|[@-Z\\-_])/g, '');

  // Orphaned CSI sequences that lost their escape byte (needs a digit or '?', so "[Agent" survives)
  result = result.replace(/^\s*(\[(?:\?|\d)\d*[A-Za-z])+\s*/g, '');

  return result;
}

/**
 * Per line: keep what is visible after the last carriage return, drop escapes
 * and trailing whitespace.
 */
export function normalizeTerminalText(raw: string): string {
  return raw
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map(line => {
      const withoutTrailingCr = line.replace(/\r+$/, '');
      const visible = withoutTrailingCr.slice(withoutTrailingCr.lastIndexOf('\r') + 1);
      return stripAnsi(visible).replace(/\s+$/, '');
    })
    .join('\n');
}

/** Line with quote/bullet/border markers removed, for comparisons only. */
export function stripLineMarkers(line: string): string {
  return line.replace(LEADING_MARKERS, '').replace(TRAILING_MARKERS, '').trim();
}

function passVariants(passKeyword: string): Set<string> {
  const keyword = passKeyword.trim().toLowerCase();
  const bare = keyword.replace(/^[[({<]+/, '').replace(/[\])}>]+$/, '').trim();
  const variants = new Set<string>([keyword]);
  if (bare !== '') {
    variants.add(bare);
    variants.add(`[${bare}]`);
  }
  return variants;
}

function lastNonEmptyLine(lines: readonly string[]): string | undefined {
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim() !== '') return lines[i];
  }
  return undefined;
}

function lineIsPass(line: string, variants: Set<string>): boolean {
  return variants.has(stripLineMarkers(line).toLowerCase());
}

/**
 * True when the text (or its last non-empty line) is the pass keyword,
 * case-insensitive, with or without its brackets.
 */
export function isPassSignal(text: string, passKeyword: string = DEFAULT_PASS_KEYWORD): boolean {
  const trimmed = text.trim();
  if (trimmed === '') return false;
  const variants = passVariants(passKeyword);
  if (lineIsPass(trimmed, variants)) return true;
  const last = lastNonEmptyLine(trimmed.split('\n'));
  return last !== undefined && lineIsPass(last, variants);
}

export interface CleanOutputOptions {
  /** The payload that was injected for this turn */
  payload?: string;
  passKeyword?: string;
}

function fenceMask(lines: readonly string[]): boolean[] {
  const mask: boolean[] = [];
  let inside = false;
  for (const line of lines) {
    if (FENCE.test(line)) {
      mask.push(true);
      inside = !inside;
    } else {
      mask.push(inside);
    }
  }
  return mask;
}

function isChromeLine(line: string): boolean {
  return line.trim() !== '' && CHROME_LINE.test(line) && HAS_CHROME_CHAR.test(line);
}

function isStatusLine(line: string): boolean {
  if (line.trim() === '') return false;
  return SPINNER_ONLY.test(line) || STATUS_PATTERNS.some(pattern => pattern.test(line));
}

class PayloadEcho {
  readonly lines: string[];
  private exact: Set<string>;

  constructor(payload: string) {
    this.lines = normalizeTerminalText(payload)
      .split('\n')
      .map(stripLineMarkers)
      .filter(line => line !== '');
    this.exact = new Set(this.lines);
  }

  get isEmpty(): boolean {
    return this.lines.length === 0;
  }

  /** First payload line, or the first row of it after the terminal wrapped it */
  isStart(line: string): boolean {
    return this.matchesEdge(stripLineMarkers(line), this.lines[0], 'prefix');
  }

  /** Last payload line, or the last row of it after wrapping */
  isEnd(line: string): boolean {
    return this.matchesEdge(stripLineMarkers(line), this.lines[this.lines.length - 1], 'suffix');
  }

  isEcho(line: string): boolean {
    const norm = stripLineMarkers(line);
    if (norm === '') return false;
    if (this.exact.has(norm)) return true;
    return norm.length >= MIN_FRAGMENT_LENGTH && this.lines.some(p => p.includes(norm));
  }

  private matchesEdge(norm: string, target: string | undefined, edge: 'prefix' | 'suffix'): boolean {
    if (!target || norm === '') return false;
    if (norm === target) return true;
    if (norm.length < Math.min(MIN_FRAGMENT_LENGTH, target.length)) return false;
    return edge === 'prefix' ? target.startsWith(norm) : target.endsWith(norm);
  }
}

function exciseEchoBlocks(lines: readonly string[], fenced: readonly boolean[], echo: PayloadEcho, keep: boolean[]): void {
  const maxSpan = echo.lines.length + ECHO_SPAN_SLACK;
  let i = 0;
  while (i < lines.length) {
    if (fenced[i] || !echo.isStart(lines[i])) {
      i++;
      continue;
    }
    let end = -1;
    for (let j = i; j < lines.length && j <= i + maxSpan; j++) {
      if (!fenced[j] && echo.isEnd(lines[j])) {
        end = j;
        break;
      }
    }
    if (end === -1) {
      keep[i] = false;
      i++;
      continue;
    }
    for (let k = i; k <= end; k++) {
      keep[k] = false;
    }
    i = end + 1;
  }
}

/**
 * Clean captured output. Returns the canonical pass keyword when the agent passed,
 * the cleaned reply otherwise, or '' when nothing is left.
 */
export function cleanCapturedOutput(raw: string, options: CleanOutputOptions = {}): string {
  const passKeyword = (options.passKeyword ?? DEFAULT_PASS_KEYWORD).trim();
  const lines = normalizeTerminalText(raw).split('\n');

  const last = lastNonEmptyLine(lines);
  if (last !== undefined && lineIsPass(last, passVariants(passKeyword))) {
    return passKeyword;
  }

  const fenced = fenceMask(lines);
  const keep = lines.map(() => true);
  const echo = new PayloadEcho(options.payload ?? '');

  if (!echo.isEmpty) {
    exciseEchoBlocks(lines, fenced, echo, keep);
  }

  for (let i = 0; i < lines.length; i++) {
    if (!keep[i] || fenced[i]) continue;
    const line = lines[i];
    if (isChromeLine(line) || isStatusLine(line) || (!echo.isEmpty && echo.isEcho(line))) {
      keep[i] = false;
    }
  }

  // Collapse blank runs outside fences, then trim blank edges
  const out: string[] = [];
  for (let i = 0; i < lines.length; i++) {
    if (!keep[i]) continue;
    const blank = lines[i].trim() === '';
    if (blank && !fenced[i] && out.length > 0 && out[out.length - 1].trim() === '') continue;
    out.push(blank && !fenced[i] ? '' : lines[i]);
  }
  while (out.length > 0 && out[0].trim() === '') out.shift();
  while (out.length > 0 && out[out.length - 1].trim() === '') out.pop();

  return out.join('\n');
}
