import {
  OracleParseError,
  listEntities,
  parseOracleJson,
  persistFailedResponse,
  universeRecordSchema,
  type BrandBrief,
  type Logger,
  type TextOracle,
  type TypedEntity,
  type UniverseRecord,
} from '@adreel/shared';

/** Recurring characters, props and locations of a script, extracted by a text oracle. */

export function buildUniversePrompt(script: string, brief: BrandBrief): string {
  return `You are a video production designer. Analyze this ${brief.scenesCount}-scene ad script and describe every element that must look the same across scenes.

## Brand Context
- Brand: ${brief.brandName}
- Product: ${brief.productDescription}
- Creative direction: ${brief.creativeDirection || 'N/A'}
- Visual style: ${brief.style}

## Script
${script}

## Instructions
1. List CHARACTERS, PROPS and LOCATIONS that appear in TWO OR MORE scenes. Single-scene elements are generated fresh per scene and must be left out.
2. For each element give the scene numbers it appears in ("scenes_used").
3. "canonical_state" describes the element's base appearance, independent of any single scene (no scene-specific damage, clothing changes or lighting).
4. "image_generation_prompt" is a complete, self-contained prompt for a reference image of the canonical state: hyper-realistic, photorealistic, neutral background for characters and props, every visual detail (materials, colors, textures, skin, hair, clothing).
5. For groups of people, describe each person individually.
6. Use short, distinctive names. Never give two elements of the same class the same name.

## Output Format (JSON only, no prose)
{
  "characters": [
    {
      "name": "Character Name",
      "scenes_used": [1, 2, 3],
      "canonical_state": "Detailed physical description",
      "image_generation_prompt": "Complete reference image prompt"
    }
  ],
  "universe": {
    "locations": [
      { "name": "Location Name", "scenes_used": [1, 4], "canonical_state": "...", "image_generation_prompt": "..." }
    ],
    "props": [
      { "name": "Prop Name", "scenes_used": [2, 5], "canonical_state": "...", "image_generation_prompt": "..." }
    ]
  }
}`;
}

/** Drop entities used in fewer than two distinct scenes. */
export function filterRecurringEntities(universe: UniverseRecord): {
  universe: UniverseRecord;
  skipped: TypedEntity[];
} {
  const recurring = (e: { scenes_used: number[] }) => new Set(e.scenes_used).size >= 2;

  const skipped = listEntities(universe).filter(({ entity }) => !recurring(entity));

  return {
    universe: {
      characters: universe.characters.filter(recurring),
      universe: {
        locations: universe.universe.locations.filter(recurring),
        props: universe.universe.props.filter(recurring),
      },
    },
    skipped,
  };
}

export interface ExtractOptions {
  /** Where an unparseable response is written. */
  debugDir: string;
}

export class UniverseExtractor {
  constructor(
    private oracle: TextOracle,
    private logger: Logger,
  ) {}

  async extract(script: string, brief: BrandBrief, options: ExtractOptions): Promise<UniverseRecord> {
    this.logger.info({ model: this.oracle.modelId, brand: brief.brandName }, 'Extracting universe');

    const raw = await this.oracle.complete(buildUniversePrompt(script, brief), {
      maxTokens: 16_000,
      temperature: 0.75,
    });

    let parsed: UniverseRecord;
    try {
      parsed = parseOracleJson(raw, universeRecordSchema, { label: 'universe record' });
    } catch (err) {
      if (err instanceof OracleParseError) {
        const path = await persistFailedResponse(options.debugDir, err);
        this.logger.error({ reason: err.reason, debugFile: path }, 'Universe response could not be parsed');
      }
      throw err;
    }

    const { universe, skipped } = filterRecurringEntities(parsed);
    for (const { type, entity } of skipped) {
      this.logger.info(
        { type, name: entity.name, scenesUsed: entity.scenes_used },
        'Skipping single-scene entity',
      );
    }

    this.logger.info(
      {
        characters: universe.characters.length,
        props: universe.universe.props.length,
        locations: universe.universe.locations.length,
        skipped: skipped.length,
      },
      'Universe extracted',
    );
    return universe;
  }
}
