import type {
  AttributedUtterance,
  SpeakerSegment,
  SpeakerTag,
  TranscriptSegment,
} from '../types/dialogue.types';
import { MalformedSegmentError } from '../utils/errors';
import { collapseWhitespace } from '../utils/transcript-format.util';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { getDegenerateSegmentsCounter, getMidpointFallbackCounter } from '../metrics/pipeline.metrics';

export const UNKNOWN_SPEAKER_LABEL = 'Speaker Unknown';

export interface AlignOptions {
  /** Called with each utterance as soon as it is attributed. */
  onUtterance?: (utterance: AttributedUtterance, index: number) => void;
  logger?: Logger;
}

export function formatSpeakerLabel(tag: SpeakerTag): string {
  return typeof tag === 'number' ? `Speaker ${tag}` : tag;
}

/**
 * Fraction of the transcript segment covered by the speaker segment.
 * Unclamped: negative when the two do not overlap.
 */
export function overlapScore(transcript: TranscriptSegment, speaker: SpeakerSegment): number {
  const overlap = Math.min(transcript.end, speaker.end) - Math.max(transcript.start, speaker.start);
  return overlap / (transcript.end - transcript.start);
}

export function findBestOverlap(
  transcript: TranscriptSegment,
  speakers: readonly SpeakerSegment[]
): SpeakerSegment | undefined {
  let maxScore = 0;
  let best: SpeakerSegment | undefined;
  for (const speaker of speakers) {
    const score = overlapScore(transcript, speaker);
    if (score > maxScore) {
      maxScore = score;
      best = speaker;
    }
  }
  return best;
}

export function findNearestMidpoint(
  transcript: TranscriptSegment,
  speakers: readonly SpeakerSegment[]
): SpeakerSegment | undefined {
  const mid = (transcript.start + transcript.end) / 2;
  let minDistance = Infinity;
  let closest: SpeakerSegment | undefined;
  for (const speaker of speakers) {
    const distance = Math.abs(mid - (speaker.start + speaker.end) / 2);
    if (distance < minDistance) {
      minDistance = distance;
      closest = speaker;
    }
  }
  return closest;
}

function assertFiniteBounds(segment: TranscriptSegment, index: number): void {
  if (!Number.isFinite(segment.start) || !Number.isFinite(segment.end)) {
    throw new MalformedSegmentError(
      `transcript segment ${index} has non-finite bounds [${segment.start}, ${segment.end}]`,
      index
    );
  }
}

/**
 * Picks the speaker for one transcript segment. Segments with end <= start
 * cannot be scored and go straight to midpoint matching.
 */
export function matchSpeaker(
  transcript: TranscriptSegment,
  speakers: readonly SpeakerSegment[]
): SpeakerSegment | undefined {
  const degenerate = transcript.end <= transcript.start;
  if (!degenerate) {
    const best = findBestOverlap(transcript, speakers);
    if (best) return best;
  }
  if (speakers.length > 0) getMidpointFallbackCounter().inc();
  return findNearestMidpoint(transcript, speakers);
}

export function alignTranscript(
  transcript: readonly TranscriptSegment[],
  speakers: readonly SpeakerSegment[],
  options: AlignOptions = {}
): AttributedUtterance[] {
  const log = options.logger ?? rootLogger;
  if (speakers.length === 0 && transcript.length > 0) {
    log.warn('aligner.no_speaker_segments', { segments: transcript.length });
  }

  const utterances: AttributedUtterance[] = [];
  transcript.forEach((segment, index) => {
    assertFiniteBounds(segment, index);
    if (segment.end <= segment.start) {
      getDegenerateSegmentsCounter().inc();
      log.warn('aligner.degenerate_segment', { index, start: segment.start, end: segment.end });
    }

    const match = matchSpeaker(segment, speakers);
    const utterance: AttributedUtterance = {
      speakerLabel: match ? formatSpeakerLabel(match.speakerTag) : UNKNOWN_SPEAKER_LABEL,
      text: collapseWhitespace(segment.text),
    };
    utterances.push(utterance);
    options.onUtterance?.(utterance, index);
  });
  return utterances;
}
