import { join } from 'path';
import {
  OracleParseError,
  PipelineError,
  parseOracleJson,
  persistFailedResponse,
  runPool,
  writeJsonArtifact,
  writeStageReport,
  type BrandBrief,
  type Logger,
  type StageReport,
  type TextOracle,
} from '@adreel/shared';
import { describeAdStyle } from './ad-styles.js';
import {
  EVALUATIONS_FILE,
  conceptKey,
  judgeResponseSchema,
  type Concept,
  type ConceptEvaluation,
  type EvaluationSet,
} from './schemas.js';

export const JUDGE_STAGE = 'judge-concepts';

const JUDGE_SYSTEM = 'You are an expert advertising judge. Respond only with valid JSON.';

export function buildJudgePrompt(concept: Concept, brief: BrandBrief): string {
  const n = brief.scenesCount;
  return `You are an expert advertising judge evaluating a single ad concept.

**BRAND**: ${brief.brandName}
**AD STYLE**: ${concept.ad_style}
**STYLE DESCRIPTION**: ${describeAdStyle(concept.ad_style)}

**AI VIDEO GENERATION CONTEXT**:
This concept will be produced with AI video generation models.
- These models can generate visuals impossible with traditional filming.
- "Impossible" visuals, transformations and reality-bending effects are ENCOURAGED if they serve the story.
- Do not penalize creative visual concepts as "unrealistic".

**CONCEPT TO EVALUATE**:

${concept.text}

---

**EVALUATION CRITERIA**:

1. **Narrative Quality** (20 points): compelling story, clear beginning, middle and end, ${n} coherent and connected scenes.
2. **Emotional Impact** (20 points): strong feeling that matches the intended style (${concept.ad_style}).
3. **Brand Integration** (15 points): the brand fits the story organically and feels necessary.
4. **Memorability** (15 points): a unique hook that stands out; bonus for a visual hook only AI can produce.
5. **Visual Clarity** (15 points): each of the ${n} scenes is easy to picture and works in about ${brief.totalDurationSec} seconds.
6. **Success Likelihood** (15 points): the target audience would respond; fresh rather than cliche.

**TOTAL**: 100 points

**INSTRUCTIONS**:
1. Evaluate honestly, based ONLY on the criteria above
2. Give a score from 0 to 100
3. List 3-5 specific strengths
4. List 3-5 specific weaknesses
5. Explain the score in 2-3 sentences

**OUTPUT FORMAT** (JSON only, no other text):
{
  "score": 85,
  "explanation": "2-3 sentence explanation",
  "strengths": ["strength 1", "strength 2", "strength 3"],
  "weaknesses": ["weakness 1", "weakness 2"]
}`;
}

export interface ConceptJudgeOptions {
  concurrency: number;
  /** Where unparseable judge responses are written. */
  debugDir: string;
}

export interface JudgeResult {
  evaluations: EvaluationSet;
  evaluationsPath: string;
  report: StageReport;
}

/** Scores every concept independently; a failed judgement only drops that concept. */
export class ConceptJudge {
  constructor(
    private oracle: TextOracle,
    private logger: Logger,
    private options: ConceptJudgeOptions,
  ) {}

  async judge(concepts: readonly Concept[], brief: BrandBrief, outputDir: string): Promise<JudgeResult> {
    this.logger.info({ concepts: concepts.length, judge: this.oracle.modelId }, 'Judging concepts');

    const tasks = concepts.map((concept) => ({
      key: conceptKey(concept),
      run: () => this.judgeOne(concept, brief),
    }));

    const outcomes = await runPool(tasks, this.options.concurrency, (outcome) => {
      if (outcome.ok) this.logger.info({ concept: outcome.key, score: outcome.value.score }, 'Concept judged');
      else this.logger.error({ concept: outcome.key, err: outcome.error.message }, 'Judging failed');
    });

    const order = new Map(concepts.map((c, i) => [conceptKey(c), i]));
    const position = (key: string) => order.get(key) ?? concepts.length;

    const evaluations: ConceptEvaluation[] = [];
    const failures: StageReport['failures'] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) evaluations.push(outcome.value);
      else failures.push({ key: outcome.key, error: outcome.error.message });
    }
    evaluations.sort((a, b) => position(conceptKey(a)) - position(conceptKey(b)));
    failures.sort((a, b) => position(a.key) - position(b.key));

    const set: EvaluationSet = {
      judge_model: this.oracle.modelId,
      generated_at: new Date().toISOString(),
      evaluations,
    };
    const evaluationsPath = await writeJsonArtifact(join(outputDir, EVALUATIONS_FILE), set);

    const report: StageReport = {
      stage: JUDGE_STAGE,
      expected: concepts.length,
      produced: evaluations.length,
      failures,
    };
    await writeStageReport(outputDir, report);

    return { evaluations: set, evaluationsPath, report };
  }

  private async judgeOne(concept: Concept, brief: BrandBrief): Promise<ConceptEvaluation> {
    const raw = await this.oracle.complete(buildJudgePrompt(concept, brief), {
      system: JUDGE_SYSTEM,
      maxTokens: 2000,
      temperature: 1,
    });

    try {
      const verdict = parseOracleJson(raw, judgeResponseSchema, { label: `judge ${conceptKey(concept)}` });
      return { ad_style: concept.ad_style, model: concept.model, ...verdict };
    } catch (err) {
      if (err instanceof OracleParseError) {
        const path = await persistFailedResponse(this.options.debugDir, err);
        this.logger.warn({ concept: conceptKey(concept), debugFile: path }, 'Judge response could not be parsed');
      }
      throw err;
    }
  }
}

/**
 * Highest score wins. Ties keep the evaluation that comes first, so callers
 * pass evaluations in brief order.
 */
export function selectBestConcept(evaluations: readonly ConceptEvaluation[]): ConceptEvaluation {
  let best: ConceptEvaluation | undefined;
  for (const evaluation of evaluations) {
    if (!best || evaluation.score > best.score) best = evaluation;
  }
  if (!best) throw new PipelineError('No concept evaluations to choose from', { fatal: true });
  return best;
}
