import { describe, it, expect } from '@jest/globals';
import { groupUtterances } from '../../../services/utterance-grouper.service';
import { buildSpeakerProfile } from '../../../services/speaker-profile.service';
import type { AttributedUtterance } from '../../../types/dialogue.types';
import { loggedRecords } from '../../test-utils/factories';

const u = (speakerLabel: string, text: string): AttributedUtterance => ({ speakerLabel, text });

const profile = buildSpeakerProfile({
  therapist: [6],
  partners: { 'Partner A': [2, 7], 'Partner B': [5] },
  excluded: [1],
});

const session: AttributedUtterance[] = [
  u('Speaker 6', 'hello'),
  u('Speaker 2', 'hi'),
  u('Speaker 7', 'and me'),
  u('Speaker 1', 'noise'),
  u('Speaker 5', 'me too'),
  u('Speaker 9', 'who'),
  u('Speaker 2', 'back'),
  u('Speaker 6', 'ok'),
  u('Speaker 2', 'again'),
];

describe('groupUtterances', () => {
  it('prefixes only when the partner changes within a client turn', () => {
    const { groups } = groupUtterances(session, profile, { partnerPrefix: 'prefixOnChange' });
    expect(groups).toEqual([
      { role: 'therapist', lines: ['hello'] },
      { role: 'client', lines: ['[Partner A]: hi', 'and me', '[Partner B]: me too', '[Partner A]: back'] },
      { role: 'therapist', lines: ['ok'] },
      { role: 'client', lines: ['[Partner A]: again'] },
    ]);
  });

  it('prefixes every client line under alwaysPrefix', () => {
    const { groups } = groupUtterances(session, profile, { partnerPrefix: 'alwaysPrefix' });
    expect(groups[1]).toEqual({
      role: 'client',
      lines: ['[Partner A]: hi', '[Partner A]: and me', '[Partner B]: me too', '[Partner A]: back'],
    });
    expect(groups[3]).toEqual({ role: 'client', lines: ['[Partner A]: again'] });
  });

  it('counts excluded and unmapped speakers in the report', () => {
    const { report } = groupUtterances(session, profile, { partnerPrefix: 'prefixOnChange' });
    expect(report).toEqual({ excludedCount: 1, unmappedCount: 1, unmappedSpeakers: { 'Speaker 9': 1 } });
  });

  it('warns about unmapped speakers', () => {
    groupUtterances([u('Speaker 9', 'a'), u('Speaker 9', 'b'), u('Speaker 4', 'c')], profile, {
      partnerPrefix: 'prefixOnChange',
    });
    expect(loggedRecords('warn')).toContainEqual(
      expect.objectContaining({
        msg: 'grouper.unmapped_speakers',
        unmappedCount: 3,
        unmappedSpeakers: { 'Speaker 9': 2, 'Speaker 4': 1 },
      })
    );
  });

  it('does not split a turn around dropped speakers', () => {
    const { groups } = groupUtterances(
      [u('Speaker 6', 'a'), u('Speaker 1', 'x'), u('Speaker 3', 'y'), u('Speaker 6', 'b')],
      profile,
      { partnerPrefix: 'prefixOnChange' }
    );
    expect(groups).toEqual([{ role: 'therapist', lines: ['a', 'b'] }]);
  });

  it('returns no groups when every speaker is excluded', () => {
    const { groups, report } = groupUtterances([u('Speaker 1', 'x'), u('Speaker 1', 'y')], profile, {
      partnerPrefix: 'prefixOnChange',
    });
    expect(groups).toEqual([]);
    expect(report.excludedCount).toBe(2);
    expect(loggedRecords('warn')).toEqual([]);
  });

  it('matches string labels verbatim', () => {
    const named = buildSpeakerProfile({ therapist: ['A'], partners: { 'Partner A': ['B'] } });
    const { groups } = groupUtterances([u('A', 'hi'), u('B', 'how are you')], named, {
      partnerPrefix: 'prefixOnChange',
    });
    expect(groups).toEqual([
      { role: 'therapist', lines: ['hi'] },
      { role: 'client', lines: ['[Partner A]: how are you'] },
    ]);
  });

  it.each(['alwaysPrefix', 'prefixOnChange'] as const)('gives identical output on repeated runs under %s', (partnerPrefix) => {
    const first = groupUtterances(session, profile, { partnerPrefix });
    const second = groupUtterances(session, profile, { partnerPrefix });
    expect(second).toEqual(first);
  });

  it('keeps every mapped utterance in its original order', () => {
    const { groups } = groupUtterances(session, profile, { partnerPrefix: 'prefixOnChange' });
    const texts = groups.flatMap((g) => g.lines).map((line) => line.replace(/^\[[^\]]+\]: /, ''));
    const mapped = session
      .filter((x) => !['Speaker 1', 'Speaker 9'].includes(x.speakerLabel))
      .map((x) => x.text);
    expect(texts).toEqual(mapped);
    expect(mapped).toEqual(['hello', 'hi', 'and me', 'me too', 'back', 'ok', 'again']);
  });

  it('drops utterances without text and keeps the turn open', () => {
    const { groups, report } = groupUtterances(
      [u('Speaker 2', 'one'), u('Speaker 5', ''), u('Speaker 6', '  '), u('Speaker 2', 'two')],
      profile,
      { partnerPrefix: 'prefixOnChange' }
    );
    expect(groups).toEqual([{ role: 'client', lines: ['[Partner A]: one', 'two'] }]);
    expect(report).toEqual({ excludedCount: 0, unmappedCount: 0, unmappedSpeakers: {} });
  });

  it('handles an empty sequence', () => {
    expect(groupUtterances([], profile, { partnerPrefix: 'alwaysPrefix' })).toEqual({
      groups: [],
      report: { excludedCount: 0, unmappedCount: 0, unmappedSpeakers: {} },
    });
  });
});
