/**
 * Sentence/line segmentation for reasoning trajectories.
 *
 * A segment ends at a sentence terminator followed by whitespace (or end of
 * text) or at a newline. Offsets index into the original text so token
 * entropies can be attributed to segments.
 */

export interface TextSegment {
  /** Raw slice including trailing whitespace */
  raw: string;
  /** Trimmed segment text */
  text: string;
  start: number;
  end: number;
  /** False for a trailing fragment that never reached a terminator */
  complete: boolean;
}

const TERMINATORS = new Set(['.', '!', '?']);
const CLOSERS = new Set(['"', "'", ')', ']', '”', '’']);
const WHITESPACE = /\s/;
const DANGLING_TAIL = /\s+(?:and|or|but|because|so|which|that|with|the|a|an|to|of|for|if|while|as|than)$/i;

function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && WHITESPACE.test(ch);
}

function push(segments: TextSegment[], text: string, start: number, end: number, complete: boolean): void {
  const raw = text.slice(start, end);
  const trimmed = raw.trim();
  if (trimmed.length === 0) return;
  segments.push({ raw, text: trimmed, start, end, complete });
}

export function splitSegments(text: string): TextSegment[] {
  const segments: TextSegment[] = [];
  let start = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    let boundary = -1;

    if (ch === '\n') {
      boundary = i + 1;
    } else if (TERMINATORS.has(ch)) {
      let j = i + 1;
      while (j < text.length && (TERMINATORS.has(text.charAt(j)) || CLOSERS.has(text.charAt(j)))) j++;
      if (j === text.length || isWhitespace(text.charAt(j))) {
        boundary = j;
      } else {
        i = j;
        continue;
      }
    }

    if (boundary === -1) {
      i++;
      continue;
    }

    let end = boundary;
    while (end < text.length && isWhitespace(text.charAt(end))) end++;
    push(segments, text, start, end, true);
    start = end;
    i = end;
  }

  if (start < text.length) {
    push(segments, text, start, text.length, false);
  }

  return segments;
}

/**
 * Whether the text ends at a sentence boundary
 */
export function isClosed(text: string): boolean {
  return /[.!?]["')\]”’]*$/.test(text.trim());
}

/**
 * Close a fragment so a trajectory never ends on a dangling clause:
 * trailing connectives and punctuation are dropped and a period added.
 */
export function ensureClosed(text: string): string {
  let trimmed = text.trim();
  if (trimmed.length === 0 || isClosed(trimmed)) return trimmed;

  trimmed = trimmed.replace(/[\s,;:–—-]+$/, '');
  let previous = '';
  while (previous !== trimmed) {
    previous = trimmed;
    trimmed = trimmed.replace(DANGLING_TAIL, '').replace(/[\s,;:–—-]+$/, '');
  }
  return trimmed.length > 0 ? `${trimmed}.` : '';
}

/**
 * Append a continuation to a prefix with a single separating space when needed
 */
export function joinContinuation(prefix: string, continuation: string): string {
  if (prefix.length === 0) return continuation;
  if (isWhitespace(prefix.charAt(prefix.length - 1)) || isWhitespace(continuation.charAt(0))) {
    return prefix + continuation;
  }
  return `${prefix} ${continuation}`;
}
