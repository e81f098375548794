import type {
  AttributedUtterance,
  GroupingReport,
  PartnerPrefixPolicy,
  SpeakerProfile,
  TurnGroup,
  TurnRole,
} from '../types/dialogue.types';
import { getUnmappedUtterancesCounter } from '../metrics/pipeline.metrics';
import { logger as rootLogger, type Logger } from '../utils/logger';

export interface GroupOptions {
  partnerPrefix: PartnerPrefixPolicy;
  logger?: Logger;
}

export interface GroupResult {
  groups: TurnGroup[];
  report: GroupingReport;
}

interface OpenGroup {
  role: TurnRole;
  lines: string[];
  // Last partner that received a "[name]: " prefix in this group
  lastPartner?: string;
}

type Classification =
  | { kind: 'excluded' }
  | { kind: 'unmapped' }
  | { kind: 'therapist' }
  | { kind: 'client'; partnerName: string };

function classify(label: string, profile: SpeakerProfile): Classification {
  if (profile.excludedSpeakers.has(label)) return { kind: 'excluded' };
  if (profile.therapistSpeakers.has(label)) return { kind: 'therapist' };
  const partnerName = profile.partnerMapping.get(label);
  if (partnerName !== undefined) return { kind: 'client', partnerName };
  return { kind: 'unmapped' };
}

/**
 * Collapses consecutive utterances of the same role into turns. Excluded and
 * unmapped speakers, and utterances without text, are dropped without closing
 * the open turn.
 */
export function groupUtterances(
  utterances: readonly AttributedUtterance[],
  profile: SpeakerProfile,
  options: GroupOptions
): GroupResult {
  const log = options.logger ?? rootLogger;
  const groups: TurnGroup[] = [];
  const report: GroupingReport = { excludedCount: 0, unmappedCount: 0, unmappedSpeakers: {} };
  let current: OpenGroup | undefined;

  const emit = () => {
    if (current && current.lines.length > 0) {
      groups.push({ role: current.role, lines: current.lines });
    }
  };

  for (const utterance of utterances) {
    if (!utterance.text.trim()) continue;
    const cls = classify(utterance.speakerLabel, profile);
    if (cls.kind === 'excluded') {
      report.excludedCount++;
      continue;
    }
    if (cls.kind === 'unmapped') {
      report.unmappedCount++;
      report.unmappedSpeakers[utterance.speakerLabel] = (report.unmappedSpeakers[utterance.speakerLabel] ?? 0) + 1;
      continue;
    }

    if (!current || current.role !== cls.kind) {
      emit();
      current = { role: cls.kind, lines: [] };
    }

    if (cls.kind === 'therapist') {
      current.lines.push(utterance.text);
    } else if (options.partnerPrefix === 'alwaysPrefix' || current.lastPartner !== cls.partnerName) {
      current.lines.push(`[${cls.partnerName}]: ${utterance.text}`);
      current.lastPartner = cls.partnerName;
    } else {
      current.lines.push(utterance.text);
    }
  }
  emit();

  if (report.unmappedCount > 0) {
    getUnmappedUtterancesCounter().inc(report.unmappedCount);
    log.warn('grouper.unmapped_speakers', {
      unmappedCount: report.unmappedCount,
      unmappedSpeakers: report.unmappedSpeakers,
    });
  }

  return { groups, report };
}
