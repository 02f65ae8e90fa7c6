import { join } from 'path';
import {
  PipelineError,
  runPool,
  writeJsonArtifact,
  writeStageReport,
  type BrandBrief,
  type Logger,
  type StageReport,
  type TextOracle,
} from '@adreel/shared';
import { describeAdStyle, isKnownAdStyle } from './ad-styles.js';
import { CONCEPTS_FILE, conceptKey, type Concept, type ConceptSet } from './schemas.js';

export const CONCEPTS_STAGE = 'generate-concepts';

export interface ConceptGeneratorOptions {
  concurrency: number;
}

export interface ConceptGenerationResult {
  concepts: ConceptSet;
  conceptsPath: string;
  report: StageReport;
}

export function buildConceptPrompt(brief: BrandBrief, adStyle: string): string {
  const n = brief.scenesCount;
  return `You are an award-winning advertising creative. Write ONE ad concept told in exactly ${n} scenes.

## Brand Context
- Brand: ${brief.brandName}
- Product: ${brief.productDescription}
- Creative direction: ${brief.creativeDirection || 'Open. Choose the strongest angle for the product.'}

## Ad Style
- Style: ${adStyle}
- What the viewer should feel: ${describeAdStyle(adStyle)}

## Production Context
The ad will be produced with AI video generation as ${n} clips, about ${brief.totalDurationSec} seconds in total.
Visuals that would be impossible to film (transformations, impossible camera moves, reality-bending effects) are welcome when they serve the story.

## Rules
- Exactly ${n} scenes, in story order, each one to three sentences of concrete, visual action
- A clear beginning, middle and end; every scene must connect to the next
- The brand must feel necessary to the story, not added on
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

/** One free-text concept per requested ad style and writer model. */
export class ConceptGenerator {
  constructor(
    private writers: readonly TextOracle[],
    private logger: Logger,
    private options: ConceptGeneratorOptions,
  ) {
    if (this.writers.length === 0) throw new PipelineError('At least one concept writer is required', { fatal: true });
  }

  async generate(brief: BrandBrief, outputDir: string): Promise<ConceptGenerationResult> {
    const styles = [...new Set(brief.adStyles)];
    for (const style of styles) {
      if (!isKnownAdStyle(style)) this.logger.warn({ style }, 'Unknown ad style, using a generic description');
    }

    const models = this.writers.map((w) => w.modelId);
    this.logger.info({ brand: brief.brandName, styles: styles.length, models }, 'Generating concepts');

    // Style-major so the written order matches the brief.
    const slots = styles.flatMap((style) => this.writers.map((writer) => ({ style, writer })));
    const tasks = slots.map(({ style, writer }) => ({
      key: conceptKey({ ad_style: style, model: writer.modelId }),
      run: () => this.generateOne(writer, brief, style),
    }));

    const outcomes = await runPool(tasks, this.options.concurrency, (outcome) => {
      if (outcome.ok) this.logger.info({ concept: outcome.key }, 'Concept generated');
      else this.logger.error({ concept: outcome.key, err: outcome.error.message }, 'Concept generation failed');
    });

    const byKey = new Map<string, Concept>();
    const failures = new Map<string, string>();
    for (const outcome of outcomes) {
      if (outcome.ok) byKey.set(outcome.key, outcome.value);
      else failures.set(outcome.key, outcome.error.message);
    }

    const keys = tasks.map((t) => t.key);
    const concepts: ConceptSet = {
      brand_name: brief.brandName,
      models,
      generated_at: new Date().toISOString(),
      concepts: keys.flatMap((key) => {
        const concept = byKey.get(key);
        return concept ? [concept] : [];
      }),
    };
    const conceptsPath = await writeJsonArtifact(join(outputDir, CONCEPTS_FILE), concepts);

    const report: StageReport = {
      stage: CONCEPTS_STAGE,
      expected: keys.length,
      produced: concepts.concepts.length,
      failures: keys.flatMap((key) => {
        const error = failures.get(key);
        return error === undefined ? [] : [{ key, error }];
      }),
    };
    await writeStageReport(outputDir, report);

    return { concepts, conceptsPath, report };
  }

  private async generateOne(writer: TextOracle, brief: BrandBrief, style: string): Promise<Concept> {
    const text = await writer.complete(buildConceptPrompt(brief, style), {
      maxTokens: 4000,
      temperature: 1,
    });
    if (!text.trim()) throw new PipelineError(`Empty concept for ${style} from ${writer.modelId}`);
    return { ad_style: style, model: writer.modelId, text: text.trim() };
  }
}
