import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import path from 'path';
import {
  RecordingPipelineService,
  artifactPath,
  attributedTranscriptPath,
  transcriptCachePath,
  type PipelineSettings,
} from '../../../services/recording-pipeline.service';
import { buildSpeakerProfile } from '../../../services/speaker-profile.service';
import { getWindowsEmittedCounter } from '../../../metrics/pipeline.metrics';
import { MalformedSegmentError, ValidationError } from '../../../utils/errors';
import { fakeProviders, makeTempDir, removeDir, seg, spk } from '../../test-utils/factories';

const profile = buildSpeakerProfile({ therapist: ['A'], partners: { 'Partner A': ['B'] } });

const exchangeTranscript = [
  seg(0, 2, 'I feel stuck'),
  seg(2, 4, 'Tell me more'),
  seg(4, 6, 'ok'),
  seg(6, 8, 'mm'),
  seg(8, 10, 'go on'),
];
const exchangeSpeakers = [spk(0, 2, 'B'), spk(2, 4, 'A'), spk(4, 8, 'B'), spk(8, 10, 'A')];

const firstExchange = [
  { from: 'human', value: '[Partner A]: I feel stuck' },
  { from: 'gpt', value: 'Tell me more' },
];
const secondExchange = [
  { from: 'human', value: '[Partner A]: ok mm' },
  { from: 'gpt', value: 'go on' },
];

async function windowsEmitted(): Promise<number> {
  const metric = await getWindowsEmittedCounter().get();
  return metric.values[0]?.value ?? 0;
}

describe('RecordingPipelineService', () => {
  let dir: string;
  let settings: PipelineSettings;

  beforeEach(() => {
    dir = makeTempDir();
    settings = {
      outputDir: path.join(dir, 'out'),
      windowSize: 5,
      partnerPrefix: 'prefixOnChange',
      lineJoin: 'spaceJoin',
      outputFormat: 'jsonl',
    };
  });

  afterEach(() => {
    removeDir(dir);
  });

  const read = (file: string) => fs.readFileSync(file, 'utf-8');

  it('processes the two-speaker greeting end to end', async () => {
    const providers = fakeProviders([seg(0, 5, 'hi'), seg(5, 10, 'how are you')], [spk(0, 4, 'A'), spk(4, 10, 'B')]);
    const pipeline = new RecordingPipelineService(settings, providers);

    const result = await pipeline.processRecording({ id: 'Ep.1', audioPath: 'ep1.mp3', profile });

    expect(read(transcriptCachePath(settings.outputDir, 'Ep.1'))).toBe(
      '[00:00.000 --> 00:05.000]  hi\n[00:05.000 --> 00:10.000]  how are you\n'
    );
    expect(read(attributedTranscriptPath(settings.outputDir, 'Ep.1'))).toBe('A: hi\nB: how are you\n');
    expect(read(artifactPath(settings.outputDir, 'Ep.1', 'jsonl'))).toBe('');
    expect(result).toEqual({
      recordingId: 'Ep.1',
      utteranceCount: 2,
      attributedPath: path.join(settings.outputDir, 'Ep.1_final.txt'),
      artifactPath: path.join(settings.outputDir, 'Ep.1_final.jsonl'),
      groupCount: 2,
      messageCount: 2,
      windowCount: 0,
      report: { excludedCount: 0, unmappedCount: 0, unmappedSpeakers: {} },
    });
    expect(providers.transcription.calls).toEqual(['ep1.mp3']);
    expect(providers.diarization.calls).toEqual(['ep1.mp3']);
  });

  it('builds turns and messages for the greeting', () => {
    const pipeline = new RecordingPipelineService(settings, fakeProviders([], []));
    const data = pipeline.buildTrainingData(
      [
        { speakerLabel: 'A', text: 'hi' },
        { speakerLabel: 'B', text: 'how are you' },
      ],
      profile
    );
    expect(data.groups).toEqual([
      { role: 'therapist', lines: ['hi'] },
      { role: 'client', lines: ['[Partner A]: how are you'] },
    ]);
    expect(data.messages).toEqual([
      { from: 'gpt', value: 'hi' },
      { from: 'human', value: '[Partner A]: how are you' },
    ]);
    expect(data.windows).toEqual([]);
  });

  it('writes one JSONL line per window', async () => {
    const pipeline = new RecordingPipelineService(settings, fakeProviders(exchangeTranscript, exchangeSpeakers));
    const before = await windowsEmitted();

    const result = await pipeline.processRecording({ id: 'Ep.2', audioPath: 'ep2.mp3', profile });

    const lines = read(artifactPath(settings.outputDir, 'Ep.2', 'jsonl')).split('\n');
    expect(lines).toEqual([
      JSON.stringify({ conversations: firstExchange }),
      JSON.stringify({ conversations: [...firstExchange, ...secondExchange] }),
      '',
    ]);
    expect(result.windowCount).toBe(2);
    expect(result.groupCount).toBe(4);
    expect(await windowsEmitted()).toBe(before + 2);
  });

  it('writes the message list as pretty JSON when configured', async () => {
    const pipeline = new RecordingPipelineService(
      { ...settings, outputFormat: 'json', lineJoin: 'newlineJoin' },
      fakeProviders(exchangeTranscript, exchangeSpeakers)
    );

    const result = await pipeline.processRecording({ id: 'Ep.2', audioPath: 'ep2.mp3', profile });

    expect(result.artifactPath).toBe(path.join(settings.outputDir, 'Ep.2_final.json'));
    expect(read(path.join(settings.outputDir, 'Ep.2_final.json'))).toBe(
      JSON.stringify(
        [firstExchange[0], firstExchange[1], { from: 'human', value: '[Partner A]: ok\nmm' }, secondExchange[1]],
        null,
        2
      )
    );
  });

  it('reuses a cached transcript instead of transcribing', async () => {
    const providers = fakeProviders([seg(0, 1, 'fresh')], [spk(0, 10, 'A')]);
    fs.mkdirSync(settings.outputDir, { recursive: true });
    fs.writeFileSync(transcriptCachePath(settings.outputDir, 'Ep.1'), '[00:00.000 --> 00:05.000]  cached line\n');
    const pipeline = new RecordingPipelineService(settings, providers);

    await pipeline.processRecording({ id: 'Ep.1', audioPath: 'ep1.mp3' });

    expect(providers.transcription.calls).toEqual([]);
    expect(read(attributedTranscriptPath(settings.outputDir, 'Ep.1'))).toBe('A: cached line\n');
  });

  it('stops after alignment without a speaker profile', async () => {
    const pipeline = new RecordingPipelineService(settings, fakeProviders([seg(0, 1, 'hello')], [spk(0, 1, 3)]));

    const result = await pipeline.processRecording({ id: 'Ep.3', audioPath: 'ep3.mp3' });

    expect(result).toEqual({
      recordingId: 'Ep.3',
      utteranceCount: 1,
      attributedPath: path.join(settings.outputDir, 'Ep.3_final.txt'),
    });
    expect(read(result.attributedPath ?? '')).toBe('Speaker 3: hello\n');
    expect(fs.existsSync(artifactPath(settings.outputDir, 'Ep.3', 'jsonl'))).toBe(false);
  });

  it('keeps attributed lines written before a malformed segment', async () => {
    const pipeline = new RecordingPipelineService(
      settings,
      fakeProviders([seg(0, 1, 'first'), seg(Number.NaN, 2, 'broken')], [spk(0, 2, 'A')])
    );

    await expect(pipeline.processRecording({ id: 'Ep.4', audioPath: 'ep4.mp3', profile })).rejects.toBeInstanceOf(
      MalformedSegmentError
    );
    expect(read(attributedTranscriptPath(settings.outputDir, 'Ep.4'))).toBe('A: first\n');
  });

  it('keeps the transcript cache when diarization fails', async () => {
    const providers = fakeProviders([seg(0, 1, 'hello')], []);
    providers.diarization.diarizeFile = async () => {
      throw new Error('diarization unavailable');
    };
    const pipeline = new RecordingPipelineService(settings, providers);

    await expect(pipeline.processRecording({ id: 'Ep.5', audioPath: 'ep5.mp3' })).rejects.toThrow(
      'diarization unavailable'
    );
    expect(read(transcriptCachePath(settings.outputDir, 'Ep.5'))).toBe('[00:00.000 --> 00:01.000]  hello\n');
  });

  it('converts an attributed transcript into training data', async () => {
    const attributedPath = path.join(dir, 'Ep.6_final.txt');
    fs.writeFileSync(attributedPath, 'B: I feel stuck\nA: Tell me more\nSpeaker 9: unmapped\n');
    const pipeline = new RecordingPipelineService(settings, fakeProviders([], []));

    const result = await pipeline.convertRecording({ id: 'Ep.6', attributedPath, profile });

    expect(result).toEqual({
      recordingId: 'Ep.6',
      utteranceCount: 3,
      artifactPath: path.join(settings.outputDir, 'Ep.6_final.jsonl'),
      groupCount: 2,
      messageCount: 2,
      windowCount: 1,
      report: { excludedCount: 0, unmappedCount: 1, unmappedSpeakers: { 'Speaker 9': 1 } },
    });
    expect(read(path.join(settings.outputDir, 'Ep.6_final.jsonl'))).toBe(
      `${JSON.stringify({ conversations: firstExchange })}\n`
    );
  });

  it('builds the same messages whether or not the attributed transcript is reread', async () => {
    const transcript = [
      seg(0, 2, 'I feel stuck'),
      seg(2, 3, ''),
      seg(3, 4, 'and\nNote: lost'),
      seg(4, 6, 'Tell me more'),
    ];
    const speakers = [spk(0, 2, 'B'), spk(2, 3, 'B'), spk(3, 4, 'B'), spk(4, 6, 'A')];
    const providers = fakeProviders(transcript, speakers);
    const pipeline = new RecordingPipelineService({ ...settings, outputFormat: 'json' }, providers);

    await pipeline.processRecording({ id: 'Ep.7', audioPath: 'ep7.mp3', profile });
    const direct = read(artifactPath(settings.outputDir, 'Ep.7', 'json'));
    await pipeline.convertRecording({
      id: 'Ep.7',
      attributedPath: attributedTranscriptPath(settings.outputDir, 'Ep.7'),
      profile,
    });
    const reread = read(artifactPath(settings.outputDir, 'Ep.7', 'json'));

    expect(reread).toBe(direct);
    expect(JSON.parse(direct)).toEqual([
      { from: 'human', value: '[Partner A]: I feel stuck and Note: lost' },
      { from: 'gpt', value: 'Tell me more' },
    ]);
  });

  it('rejects an invalid window size up front', () => {
    expect(() => new RecordingPipelineService({ ...settings, windowSize: 0 }, fakeProviders([], []))).toThrow(
      ValidationError
    );
  });
});
