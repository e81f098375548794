import fs from 'fs';
import path from 'path';
import type {
  AttributedUtterance,
  ConversationWindow,
  DialogueMessage,
  GroupingReport,
  LineJoinPolicy,
  OutputFormat,
  PartnerPrefixPolicy,
  SpeakerProfile,
  SpeakerSegment,
  TranscriptSegment,
  TurnGroup,
} from '../types/dialogue.types';
import type { TranscriptionPort } from './ports/transcription.port';
import type { DiarizationPort } from './ports/diarization.port';
import { alignTranscript } from './transcript-speaker-aligner.service';
import { groupUtterances } from './utterance-grouper.service';
import { assertWindowSize, buildWindows, toDialogueMessages } from './dialogue-windowizer.service';
import { getWindowsEmittedCounter } from '../metrics/pipeline.metrics';
import {
  formatAttributedLine,
  formatTranscriptRecords,
  parseAttributedTranscript,
  parseTranscriptRecords,
} from '../utils/transcript-format.util';
import { logger, type Logger } from '../utils/logger';

export interface PipelineSettings {
  outputDir: string;
  windowSize: number;
  partnerPrefix: PartnerPrefixPolicy;
  lineJoin: LineJoinPolicy;
  outputFormat: OutputFormat;
}

export interface PipelineProviders {
  transcription: TranscriptionPort;
  diarization: DiarizationPort;
}

export interface RecordingInput {
  id: string;
  audioPath: string;
  profile?: SpeakerProfile;
}

export interface ConversionInput {
  id: string;
  attributedPath: string;
  profile: SpeakerProfile;
}

export interface TrainingData {
  groups: TurnGroup[];
  report: GroupingReport;
  messages: DialogueMessage[];
  windows: ConversationWindow[];
}

export interface RecordingResult {
  recordingId: string;
  utteranceCount: number;
  attributedPath?: string;
  artifactPath?: string;
  groupCount?: number;
  messageCount?: number;
  windowCount?: number;
  report?: GroupingReport;
}

export function transcriptCachePath(outputDir: string, id: string): string {
  return path.join(outputDir, `${id}_transcript.txt`);
}

export function attributedTranscriptPath(dir: string, id: string): string {
  return path.join(dir, `${id}_final.txt`);
}

export function artifactPath(outputDir: string, id: string, format: OutputFormat): string {
  return path.join(outputDir, `${id}_final.${format}`);
}

/**
 * Runs one recording through transcription, diarization, alignment and
 * (when a speaker profile is configured) grouping and windowing.
 */
export class RecordingPipelineService {
  constructor(
    private readonly settings: PipelineSettings,
    private readonly providers: PipelineProviders
  ) {
    assertWindowSize(settings.windowSize);
  }

  async loadOrTranscribe(id: string, audioPath: string, log: Logger = logger): Promise<TranscriptSegment[]> {
    const cachePath = transcriptCachePath(this.settings.outputDir, id);
    if (fs.existsSync(cachePath)) {
      const segments = parseTranscriptRecords(await fs.promises.readFile(cachePath, 'utf-8'));
      log.info('pipeline.transcript.cache_hit', { cachePath, segments: segments.length });
      return segments;
    }

    const segments = await this.providers.transcription.transcribeFile(audioPath);
    await fs.promises.mkdir(this.settings.outputDir, { recursive: true });
    await fs.promises.writeFile(cachePath, formatTranscriptRecords(segments), 'utf-8');
    log.info('pipeline.transcript.cached', { cachePath, segments: segments.length });
    return segments;
  }

  async processRecording(input: RecordingInput): Promise<RecordingResult> {
    const log = logger.child({ recordingId: input.id });
    const transcript = await this.loadOrTranscribe(input.id, input.audioPath, log);
    const speakers = await this.providers.diarization.diarizeFile(input.audioPath);
    log.info('pipeline.diarization.loaded', { speakerSegments: speakers.length });

    const attributedPath = attributedTranscriptPath(this.settings.outputDir, input.id);
    const utterances = this.alignToFile(transcript, speakers, attributedPath, log);
    log.info('pipeline.alignment.completed', { attributedPath, utterances: utterances.length });

    const result: RecordingResult = { recordingId: input.id, utteranceCount: utterances.length, attributedPath };
    if (!input.profile) {
      log.info('pipeline.training.skipped_no_profile');
      return result;
    }
    return { ...result, ...this.writeTrainingArtifact(input.id, utterances, input.profile, log) };
  }

  async convertRecording(input: ConversionInput): Promise<RecordingResult> {
    const log = logger.child({ recordingId: input.id });
    const utterances = parseAttributedTranscript(await fs.promises.readFile(input.attributedPath, 'utf-8'));
    log.info('pipeline.attributed.loaded', { path: input.attributedPath, utterances: utterances.length });
    return {
      recordingId: input.id,
      utteranceCount: utterances.length,
      ...this.writeTrainingArtifact(input.id, utterances, input.profile, log),
    };
  }

  buildTrainingData(utterances: readonly AttributedUtterance[], profile: SpeakerProfile, log: Logger = logger): TrainingData {
    const { groups, report } = groupUtterances(utterances, profile, {
      partnerPrefix: this.settings.partnerPrefix,
      logger: log,
    });
    const messages = toDialogueMessages(groups, this.settings.lineJoin);
    const windows = buildWindows(messages, this.settings.windowSize);
    return { groups, report, messages, windows };
  }

  // One synchronous write per line keeps already attributed lines on disk if a later step fails
  private alignToFile(
    transcript: TranscriptSegment[],
    speakers: readonly SpeakerSegment[],
    filePath: string,
    log: Logger
  ): AttributedUtterance[] {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const fd = fs.openSync(filePath, 'w');
    try {
      return alignTranscript(transcript, speakers, {
        onUtterance: (utterance) => {
          const line = formatAttributedLine(utterance);
          fs.writeSync(fd, `${line}\n`);
          log.debug('pipeline.alignment.line', { line });
        },
        logger: log,
      });
    } finally {
      fs.closeSync(fd);
    }
  }

  private writeTrainingArtifact(
    id: string,
    utterances: readonly AttributedUtterance[],
    profile: SpeakerProfile,
    log: Logger
  ): Omit<RecordingResult, 'recordingId' | 'utteranceCount' | 'attributedPath'> {
    const data = this.buildTrainingData(utterances, profile, log);
    const outPath = artifactPath(this.settings.outputDir, id, this.settings.outputFormat);
    fs.mkdirSync(this.settings.outputDir, { recursive: true });

    if (this.settings.outputFormat === 'json') {
      fs.writeFileSync(outPath, JSON.stringify(data.messages, null, 2), 'utf-8');
    } else {
      const lines = data.windows.map((w) => `${JSON.stringify({ conversations: w.messages })}\n`);
      fs.writeFileSync(outPath, lines.join(''), 'utf-8');
      getWindowsEmittedCounter().inc(data.windows.length);
    }

    const human = data.messages.filter((m) => m.from === 'human').length;
    log.info('pipeline.artifact.written', {
      path: outPath,
      format: this.settings.outputFormat,
      windowSize: this.settings.windowSize,
      groups: data.groups.length,
      messages: data.messages.length,
      humanMessages: human,
      gptMessages: data.messages.length - human,
      windows: data.windows.length,
      excluded: data.report.excludedCount,
      unmapped: data.report.unmappedCount,
    });

    return {
      artifactPath: outPath,
      groupCount: data.groups.length,
      messageCount: data.messages.length,
      windowCount: data.windows.length,
      report: data.report,
    };
  }
}
