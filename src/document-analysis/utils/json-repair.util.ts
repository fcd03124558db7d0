import { ResponseUnparseableError } from '../domain/errors/document-analysis.errors';
import { isRecord, LooseRecord, truncate } from '../../utils/coerce.util';

const FENCED_BLOCK_RE = /```(?:json)?\s*([\s\S]*?)```/i;
const PREVIEW_LENGTH = 500;

type ParseOutcome =
  | { kind: 'object'; value: LooseRecord }
  | { kind: 'other' }
  | { kind: 'invalid' };

function parse(candidate: string): ParseOutcome {
  try {
    const value: unknown = JSON.parse(candidate);
    return isRecord(value) ? { kind: 'object', value } : { kind: 'other' };
  } catch {
    return { kind: 'invalid' };
  }
}

/**
 * Walks text from the first '{' and returns the balanced object, ignoring
 * braces inside strings. An unterminated object is returned up to the end.
 */
export function extractBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return text.slice(start);
}

/** Remove // and block comments that are not inside string literals. */
export function stripComments(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    const next = text[i + 1];

    if (inString) {
      out += char;
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '/' && next === '/') {
      const newline = text.indexOf('\n', i);
      if (newline === -1) break;
      i = newline - 1;
      continue;
    }
    if (char === '/' && next === '*') {
      const end = text.indexOf('*/', i + 2);
      if (end === -1) break;
      i = end + 1;
      continue;
    }

    if (char === '"') inString = true;
    out += char;
  }

  return out;
}

/** Drop commas directly followed (after whitespace) by '}' or ']'. */
export function removeTrailingCommas(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      out += char;
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === ',') {
      const rest = text.slice(i + 1).trimStart();
      if (rest.startsWith('}') || rest.startsWith(']')) {
        continue;
      }
    }
    if (char === '"') inString = true;
    out += char;
  }

  return out;
}

/** Append the closers of still-open strings, arrays and objects. */
export function closeOpenBrackets(text: string): string {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const char of text) {
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === '{') stack.push('}');
    else if (char === '[') stack.push(']');
    else if ((char === '}' || char === ']') && stack[stack.length - 1] === char) {
      stack.pop();
    }
  }

  return (inString ? `${text}"` : text) + stack.reverse().join('');
}

/**
 * Turn raw model output into a JSON object.
 *
 * Ladder: direct parse, fenced code block, first balanced object, then the
 * balanced object with comments, trailing commas and missing closers fixed.
 *
 * @throws ResponseUnparseableError when no step yields a JSON object
 */
export function repairJson(raw: string): LooseRecord {
  const trimmed = raw.trim();
  const fenced = FENCED_BLOCK_RE.exec(trimmed)?.[1]?.trim();
  const balanced = extractBalancedObject(fenced ?? trimmed);

  const candidates = [trimmed, fenced, balanced];
  const base = balanced ?? fenced ?? trimmed;
  candidates.push(
    removeTrailingCommas(closeOpenBrackets(removeTrailingCommas(stripComments(base)))),
  );

  let sawNonObject = false;
  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const outcome = parse(candidate);
    if (outcome.kind === 'object') {
      return outcome.value;
    }
    if (outcome.kind === 'other') {
      sawNonObject = true;
    }
  }

  throw new ResponseUnparseableError(
    sawNonObject
      ? 'Model response is JSON but not an object'
      : 'Model response could not be parsed as JSON',
    truncate(trimmed, PREVIEW_LENGTH),
  );
}
