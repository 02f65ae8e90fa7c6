import { join } from 'path';
import {
  PipelineError,
  writeJsonArtifact,
  writeStageReport,
  type BrandBrief,
  type Logger,
  type StageReport,
  type TextOracle,
} from '@adreel/shared';
import { describeAdStyle } from './ad-styles.js';
import { CONCEPTS_STAGE, type ConceptGenerationResult } from './generator.js';
import { CONCEPTS_FILE, type ConceptSet } from './schemas.js';

const EXPAND_SYSTEM = 'You are an elite creative director specializing in video advertising.';

export function buildExpansionPrompt(seed: string, brief: BrandBrief): string {
  const n = brief.scenesCount;
  const style = brief.adStyles[0];
  const perScene = brief.clipDurationSec ?? Math.round(brief.totalDurationSec / n);

  return `Expand the high-level ad concept below into a complete ${n}-scene narrative.

## High-Level Concept
${seed}

## Brand Context
- Brand: ${brief.brandName}
- Product: ${brief.productDescription}
- Creative direction: ${brief.creativeDirection || 'Follow the concept.'}
- Ad style: ${style} (${describeAdStyle(style)})

## Production Context
The ad will be produced with AI video generation as ${n} clips of about ${perScene} seconds, ${brief.totalDurationSec} seconds in total.

## Rules
- Keep the idea, tone and any named characters of the concept; fill in what it leaves open
- Exactly ${n} scenes, in story order, each one to three sentences of concrete, visual action
- Every scene must connect to the next and fit in about ${perScene} seconds
- Keep the cast small and recurring so characters can stay visually consistent
- The final scene lands on the product
- Do not ask questions; everything you need is above

## Output Format (plain text, no markdown headings)
TITLE: <short title>
SCENE 1: <what we see and hear>
...
SCENE ${n}: <what we see and hear>
TAGLINE: <one line>`;
}

/**
 * Develops the brief's own concept into a full one, in place of drafting
 * concepts per style. The result is judged and revised like any draft.
 */
export class ConceptExpander {
  constructor(
    private oracle: TextOracle,
    private logger: Logger,
  ) {}

  async expand(seed: string, brief: BrandBrief, outputDir: string): Promise<ConceptGenerationResult> {
    const style = brief.adStyles[0];
    this.logger.info({ brand: brief.brandName, style, model: this.oracle.modelId }, 'Expanding concept');

    const text = await this.oracle.complete(buildExpansionPrompt(seed, brief), {
      system: EXPAND_SYSTEM,
      maxTokens: 4000,
      temperature: 1,
    });
    if (!text.trim()) throw new PipelineError('Concept expansion returned no text', { fatal: true });

    const concepts: ConceptSet = {
      brand_name: brief.brandName,
      models: [this.oracle.modelId],
      generated_at: new Date().toISOString(),
      seed,
      concepts: [{ ad_style: style, model: this.oracle.modelId, text: text.trim() }],
    };
    const conceptsPath = await writeJsonArtifact(join(outputDir, CONCEPTS_FILE), concepts);

    const report: StageReport = { stage: CONCEPTS_STAGE, expected: 1, produced: 1, failures: [] };
    await writeStageReport(outputDir, report);

    return { concepts, conceptsPath, report };
  }
}
