import fs from 'fs';
import type { SpeakerProfile } from '../types/dialogue.types';
import { ConfigurationError, errorMessage } from '../utils/errors';
import {
  RecordingsFileSchema,
  SpeakerConfigSchema,
  formatZodIssues,
  type RecordingsFile,
  type SpeakerConfigInput,
} from '../utils/zod-schemas/recordings-config.schema';
import { formatSpeakerLabel } from './transcript-speaker-aligner.service';

/**
 * Builds the immutable profile the grouper consults. A label may appear in
 * only one of therapist / excluded / partner sets; duplicates within one set
 * are harmless.
 */
export function buildSpeakerProfile(input: SpeakerConfigInput): SpeakerProfile {
  const parsed = SpeakerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('invalid speaker configuration', formatZodIssues(parsed.error));
  }
  const config = parsed.data;

  const therapistSpeakers = new Set(config.therapist.map(formatSpeakerLabel));
  const excludedSpeakers = new Set(config.excluded.map(formatSpeakerLabel));
  const partnerMapping = new Map<string, string>();
  const conflicts: string[] = [];

  for (const [partnerName, ids] of Object.entries(config.partners)) {
    for (const label of ids.map(formatSpeakerLabel)) {
      const previous = partnerMapping.get(label);
      if (previous !== undefined && previous !== partnerName) {
        conflicts.push(`${label} is mapped to both "${previous}" and "${partnerName}"`);
        continue;
      }
      partnerMapping.set(label, partnerName);
    }
  }

  for (const label of therapistSpeakers) {
    if (excludedSpeakers.has(label)) conflicts.push(`${label} is both therapist and excluded`);
    if (partnerMapping.has(label)) conflicts.push(`${label} is both therapist and partner`);
  }
  for (const label of excludedSpeakers) {
    if (partnerMapping.has(label)) conflicts.push(`${label} is both excluded and partner`);
  }

  if (conflicts.length > 0) {
    throw new ConfigurationError('speaker sets overlap', conflicts);
  }

  return Object.freeze({ therapistSpeakers, excludedSpeakers, partnerMapping });
}

export function loadRecordingsFile(filePath: string): RecordingsFile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`cannot read recordings config ${filePath}: ${errorMessage(err)}`);
  }
  const parsed = RecordingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`invalid recordings config ${filePath}`, formatZodIssues(parsed.error));
  }
  return parsed.data;
}
