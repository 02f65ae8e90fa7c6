import { PipelineError, type BrandBrief, type Logger, type TextOracle } from '@adreel/shared';
import { conceptKey, type Concept, type ConceptEvaluation } from './schemas.js';

export const REVISE_STAGE = 'revise-script';

function bulletList(items: readonly string[]): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : '- None noted';
}

export function buildRevisionPrompt(concept: Concept, evaluation: ConceptEvaluation, brief: BrandBrief): string {
  const n = brief.scenesCount;
  const perScene = Math.round(brief.totalDurationSec / n);

  return `You are a video production expert. Revise this ${n}-scene ad concept into a video script that can be rendered in ${brief.totalDurationSec} seconds (about ${perScene} seconds per scene).

## Brand Context
- Brand: ${brief.brandName}
- Product: ${brief.productDescription}
- Creative direction: ${brief.creativeDirection || 'N/A'}
- Ad style: ${concept.ad_style}

## Original Concept
${concept.text}

## Judge Feedback (score ${evaluation.score}/100)
${evaluation.explanation}

Strengths to keep:
${bulletList(evaluation.strengths)}

Weaknesses to address:
${bulletList(evaluation.weaknesses)}

## Instructions
1. Keep the core story, characters and narrative arc
2. Fix the weaknesses above with the smallest changes that work
3. Simplify any scene too complex to show in about ${perScene} seconds
4. Describe each scene visually: who is there, where, what they do, what we hear
5. Use the same name for a character, prop or location every time it appears

## Output Format (plain text)
SCENE 1: ...
...
SCENE ${n}: ...

STANDOUT ELEMENTS: 1-2 sentences on what makes this concept memorable.`;
}

/** Turns the winning concept into the scene-by-scene script later stages read. */
export class ScriptReviser {
  constructor(
    private oracle: TextOracle,
    private logger: Logger,
  ) {}

  async revise(concept: Concept, evaluation: ConceptEvaluation, brief: BrandBrief): Promise<string> {
    this.logger.info(
      { concept: conceptKey(concept), score: evaluation.score, model: this.oracle.modelId },
      'Revising script',
    );

    const text = await this.oracle.complete(buildRevisionPrompt(concept, evaluation, brief), {
      maxTokens: 8000,
    });
    const script = text.trim();
    if (!script) throw new PipelineError('Script revision returned no text', { fatal: true });
    return script;
  }
}
