import { SequenceNotFoundError } from './errors';

/**
 * Case-insensitive lookup of a `start ... end` range in plain text.
 * Returns the offsets of `start` and of `end`, the latter searched only after
 * `start`. A "Respondent" end falls back to "Respondents" closing a line.
 */
export function findSubstring(text: string, start: string, end: string): [number, number] {
  const lower = text.toLowerCase();
  const startIndex = lower.indexOf(start.toLowerCase());
  if (startIndex === -1) {
    throw new SequenceNotFoundError(start);
  }

  const rest = lower.slice(startIndex);
  let endIndex = rest.indexOf(end.toLowerCase());
  if (endIndex === -1 && end.toLowerCase().startsWith('resp')) {
    endIndex = rest.indexOf(`${end.toLowerCase()}s\n`);
  }

  if (endIndex === -1) {
    throw new SequenceNotFoundError(
      end,
      `Sequence "${end}" could not be found after "${start}" (offset ${startIndex})`,
    );
  }

  return [startIndex, startIndex + endIndex];
}
