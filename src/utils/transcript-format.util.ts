import type { AttributedUtterance, TranscriptSegment } from '../types/dialogue.types';
import { TranscriptFormatError } from './errors';

// Cached transcription records look like:
//   [00:00.000 --> 00:06.140]  Welcome back, everyone.
//   [01:02:03.500 --> 01:02:07.000]  Hours appear once the session passes an hour.

const RECORD_ARROW = ' --> ';

/** Collapses runs of whitespace, line breaks included, so text fits on one record line. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function formatTimestamp(seconds: number): string {
  // Round to milliseconds first so 59.9996 becomes 01:00.000, never 00:60.000
  const totalMs = Math.round(seconds * 1000);
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = ((totalMs % 60_000) / 1000).toFixed(3).padStart(6, '0');
  const mm = String(minutes).padStart(2, '0');
  if (hours > 0) return `${String(hours).padStart(2, '0')}:${mm}:${secs}`;
  return `${mm}:${secs}`;
}

export function parseTimestamp(value: string, lineNumber = 0): number {
  const parts = value.trim().split(':');
  const wholeOk = (p: string) => /^\d+$/.test(p);
  const secondsOk = (p: string) => /^\d+(\.\d+)?$/.test(p);

  if (parts.length === 2 && wholeOk(parts[0]) && secondsOk(parts[1])) {
    return parseInt(parts[0], 10) * 60 + parseFloat(parts[1]);
  }
  if (parts.length === 3 && wholeOk(parts[0]) && wholeOk(parts[1]) && secondsOk(parts[2])) {
    return parseInt(parts[0], 10) * 3600 + parseInt(parts[1], 10) * 60 + parseFloat(parts[2]);
  }
  throw new TranscriptFormatError(`invalid timestamp "${value}"`, lineNumber);
}

export function formatTranscriptRecords(segments: readonly TranscriptSegment[]): string {
  return segments
    .map((s) => `[${formatTimestamp(s.start)}${RECORD_ARROW}${formatTimestamp(s.end)}]  ${collapseWhitespace(s.text)}\n`)
    .join('');
}

/** Lines that are not `[start --> end]` records are ignored. */
export function parseTranscriptRecords(content: string): TranscriptSegment[] {
  const segments: TranscriptSegment[] = [];
  content.split(/\r?\n/).forEach((rawLine, i) => {
    const line = rawLine.trim();
    if (!line.startsWith('[') || !line.includes('-->')) return;
    const close = line.indexOf(']');
    if (close === -1) return;

    const lineNumber = i + 1;
    const stamps = line.slice(1, close).split(RECORD_ARROW);
    if (stamps.length !== 2) {
      throw new TranscriptFormatError(`malformed time range "${line.slice(0, close + 1)}"`, lineNumber);
    }
    segments.push({
      start: parseTimestamp(stamps[0], lineNumber),
      end: parseTimestamp(stamps[1], lineNumber),
      text: line.slice(close + 1).trim(),
    });
  });
  return segments;
}

export function formatAttributedLine(utterance: AttributedUtterance): string {
  return `${utterance.speakerLabel}: ${collapseWhitespace(utterance.text)}`;
}

const LABELED_LINE = /^([^:]+):(?:\s+(.*))?$/;

/**
 * Reads an attributed transcript back into utterances. The label is the text
 * before the first colon; lines without one continue the previous utterance.
 * Utterances whose text ends up empty are dropped.
 */
export function parseAttributedTranscript(content: string): AttributedUtterance[] {
  const utterances: AttributedUtterance[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    if (!line.trim()) continue;
    const match = LABELED_LINE.exec(line);
    if (match) {
      utterances.push({ speakerLabel: match[1].trim(), text: (match[2] ?? '').trim() });
    } else if (utterances.length > 0) {
      const last = utterances[utterances.length - 1];
      last.text = last.text ? `${last.text} ${line.trim()}` : line.trim();
    }
  }
  return utterances.filter((u) => u.text.length > 0);
}
