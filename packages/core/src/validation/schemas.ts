/**
 * Zod schemas for validating values handed over by external collaborators
 */

import { z } from 'zod';

/** Rule match as reported by an analysis engine or rule plugin */
export const ruleMatchSchema = z
  .object({
    ruleId: z.string().min(1),
    subId: z.string().optional(),
    fromPos: z.number().int().min(0),
    toPos: z.number().int().min(0),
    line: z.number().int().min(0),
    endLine: z.number().int().min(0),
    column: z.number().int().min(0),
    endColumn: z.number().int().min(0),
    message: z.string(),
    shortMessage: z.string().optional(),
    suggestedReplacements: z.array(z.string()),
    url: z.string().optional(),
  })
  .refine((m) => m.fromPos <= m.toPos, {
    message: 'fromPos must not be greater than toPos',
    path: ['toPos'],
  })
  .refine((m) => m.line <= m.endLine, {
    message: 'line must not be greater than endLine',
    path: ['endLine'],
  });

/** Rule id lists as written in configuration files */
export const ruleSelectionSchema = z
  .object({
    disable: z.array(z.string().min(1)).default([]),
    enable: z.array(z.string().min(1)).default([]),
    /** Only run explicitly enabled rules (ignored when enable is empty) */
    enabledOnly: z.boolean().default(true),
  })
  .strict();

export type RuleSelection = z.infer<typeof ruleSelectionSchema>;

/** Flat map of message keys to message texts */
export const messageBundleSchema = z.record(z.string());

export type MessageBundle = z.infer<typeof messageBundleSchema>;
