import { z } from 'zod';

// Numeric ids are diarization tags ("Speaker 7"); strings are labels used verbatim.
export const SpeakerIdSchema = z.union([z.number().int().nonnegative(), z.string().min(1)]);

export const SpeakerConfigSchema = z.object({
  therapist: z.array(SpeakerIdSchema).default([]),
  partners: z.record(z.string().min(1), z.array(SpeakerIdSchema)).default({}),
  excluded: z.array(SpeakerIdSchema).default([]),
});

export type SpeakerConfig = z.infer<typeof SpeakerConfigSchema>;
export type SpeakerConfigInput = z.input<typeof SpeakerConfigSchema>;

export const RecordingConfigSchema = z.object({
  id: z.string().min(1),
  audioFile: z.string().min(1).optional(),
  speakers: SpeakerConfigSchema.optional(),
});

export type RecordingConfig = z.infer<typeof RecordingConfigSchema>;

export const RecordingsFileSchema = z.object({
  recordings: z.array(RecordingConfigSchema),
}).superRefine((value, ctx) => {
  const seen = new Set<string>();
  value.recordings.forEach((recording, index) => {
    if (seen.has(recording.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['recordings', index, 'id'],
        message: `duplicate recording id "${recording.id}"`,
      });
    }
    seen.add(recording.id);
  });
});

export type RecordingsFile = z.infer<typeof RecordingsFileSchema>;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
