// Segment streams from the external providers. Times are in seconds.
export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export type SpeakerTag = string | number;

export interface SpeakerSegment {
  start: number;
  end: number;
  speakerTag: SpeakerTag;
}

export interface AttributedUtterance {
  speakerLabel: string;
  text: string;
}

export interface SpeakerProfile {
  readonly therapistSpeakers: ReadonlySet<string>;
  readonly excludedSpeakers: ReadonlySet<string>;
  /** speaker label -> partner name, e.g. "Speaker 4" -> "Partner A" */
  readonly partnerMapping: ReadonlyMap<string, string>;
}

export type TurnRole = 'therapist' | 'client';

export interface TurnGroup {
  role: TurnRole;
  lines: string[];
}

export type DialogueRole = 'human' | 'gpt';

export interface DialogueMessage {
  from: DialogueRole;
  value: string;
}

export interface Exchange {
  humanIndex: number;
  gptIndex: number;
}

export interface ConversationWindow {
  messages: DialogueMessage[];
}

export type PartnerPrefixPolicy = 'alwaysPrefix' | 'prefixOnChange';
export type LineJoinPolicy = 'newlineJoin' | 'spaceJoin';
export type OutputFormat = 'json' | 'jsonl';

export interface GroupingReport {
  excludedCount: number;
  unmappedCount: number;
  unmappedSpeakers: Record<string, number>;
}
