import { z } from 'zod';
import { FEEDBACK_KINDS } from '../feedback/feedback.types';

const Filters = z
  .object({
    documentIds: z.array(z.string().min(1)).optional(),
    sourceTypes: z.array(z.enum(['text', 'markdown', 'pdf', 'docx'])).optional(),
    structuralTags: z.array(z.enum(['heading', 'body', 'table'])).optional(),
  })
  .default({});

export const AskSchema = z.object({
  conversationId: z.string().min(1).max(200).optional(),
  message: z.string().trim().min(1).max(4000),
  k: z.number().int().min(1).max(50).optional(),
  filters: Filters,
});

export type AskInput = z.infer<typeof AskSchema>;

export const UploadSchema = z.object({
  documentId: z
    .string()
    .regex(/^[A-Za-z0-9._-]{1,128}$/, 'documentId may contain letters, digits, ".", "_" and "-"')
    .optional(),
  title: z.string().trim().min(1).max(500),
  contentType: z.string().min(1),
  content: z.string(),
  encoding: z.enum(['utf8', 'base64']).default('utf8'),
});

export type UploadInput = z.infer<typeof UploadSchema>;

const TurnRef = {
  conversationId: z.string().min(1),
  answerId: z.string().min(1),
};

export const FeedbackSchema = z.object({
  ...TurnRef,
  author: z.string().min(1),
  kind: z.enum(FEEDBACK_KINDS),
  comment: z.string().max(2000).optional(),
});

export const ReactionSchema = z.object({
  ...TurnRef,
  type: z.enum(['reaction_added', 'reaction_removed']),
  reaction: z.string().min(1),
  user: z.string().min(1),
});

const IsoDate = z
  .string()
  .datetime({ offset: true })
  .transform((v) => new Date(v))
  .optional();

export const StatsQuerySchema = z.object({
  from: IsoDate,
  to: IsoDate,
  groupBy: z.enum(['none', 'day', 'conversation', 'author']).default('none'),
});

export const ExportQuerySchema = z.object({
  from: IsoDate,
  to: IsoDate,
  format: z.enum(['json', 'csv']).default('json'),
});
