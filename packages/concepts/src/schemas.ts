import { z } from 'zod';

// ─── Concepts ───

export const conceptSchema = z.object({
  ad_style: z.string().min(1),
  /** Writer that drafted the concept. */
  model: z.string().min(1),
  text: z.string().min(1),
});

export type Concept = z.infer<typeof conceptSchema>;

/** Identifies one concept (and its evaluation) across stages: "Humor - Playful [openai/gpt-5]". */
export function conceptKey({ ad_style, model }: { ad_style: string; model: string }): string {
  return `${ad_style} [${model}]`;
}

export const conceptSetSchema = z.object({
  brand_name: z.string(),
  models: z.array(z.string()),
  generated_at: z.string(),
  /** The brief's own idea, when the set holds its expansion rather than fresh drafts. */
  seed: z.string().optional(),
  /** Style-major brief order, then writer order; failed drafts are left out. */
  concepts: z.array(conceptSchema),
});

export type ConceptSet = z.infer<typeof conceptSetSchema>;

export const CONCEPTS_FILE = 'concepts.json';

// ─── Judge ───

/** What the judge oracle must return for one concept. */
export const judgeResponseSchema = z.object({
  score: z.coerce.number().min(0).max(100),
  explanation: z.string().default(''),
  strengths: z.array(z.string()).default([]),
  weaknesses: z.array(z.string()).default([]),
});

export type JudgeResponse = z.infer<typeof judgeResponseSchema>;

export const evaluationSchema = judgeResponseSchema.extend({
  ad_style: z.string().min(1),
  model: z.string().min(1),
});

export type ConceptEvaluation = z.infer<typeof evaluationSchema>;

export const evaluationSetSchema = z.object({
  judge_model: z.string(),
  generated_at: z.string(),
  evaluations: z.array(evaluationSchema),
});

export type EvaluationSet = z.infer<typeof evaluationSetSchema>;

export const EVALUATIONS_FILE = 'evaluations.json';

// ─── Revision ───

export const REVISED_SCRIPT_FILE = 'revised_script.txt';
