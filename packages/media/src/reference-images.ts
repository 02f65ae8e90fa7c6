import { join, relative } from 'path';
import {
  ELEMENT_TYPES,
  IMAGE_MANIFEST_FILE,
  MediaGenerationError,
  listEntities,
  runPool,
  slugify,
  writeJsonArtifact,
  writeStageReport,
  type ImageManifest,
  type Logger,
  type ManifestElement,
  type Resolution,
  type StageReport,
  type TypedEntity,
  type UniverseRecord,
} from '@adreel/shared';
import { persistMediaAs } from './persist.js';
import type { ImageProvider } from './types.js';

export const REFERENCES_STAGE = 'generate-references';

export interface ReferenceImageOptions {
  concurrency: number;
  resolution: Resolution;
}

export interface ReferenceImageResult {
  manifest: ImageManifest;
  manifestPath: string;
  report: StageReport;
}

/**
 * "characters/mia/mia_canonical", relative to the manifest directory. The
 * extension follows the format the provider returns.
 */
export function canonicalImageStem({ type, entity }: TypedEntity): string {
  const slug = slugify(entity.name) || 'element';
  return join(`${type}s`, slug, `${slug}_canonical`);
}

/** Slug collisions get a numeric suffix so no two workers write the same file. */
function claimStem(stem: string, taken: Set<string>): string {
  let candidate = stem;
  for (let n = 2; taken.has(candidate); n++) candidate = `${stem}_${n}`;
  taken.add(candidate);
  return candidate;
}

function byTypeThenName(a: ManifestElement, b: ManifestElement): number {
  const byType = ELEMENT_TYPES.indexOf(a.element_type) - ELEMENT_TYPES.indexOf(b.element_type);
  if (byType !== 0) return byType;
  return a.element_name < b.element_name ? -1 : a.element_name > b.element_name ? 1 : 0;
}

/** One canonical reference image per recurring entity, plus the manifest that indexes them. */
export class ReferenceImageAssigner {
  constructor(
    private images: ImageProvider,
    private logger: Logger,
    private options: ReferenceImageOptions,
  ) {}

  async assign(universe: UniverseRecord, scriptId: string, outputDir: string): Promise<ReferenceImageResult> {
    const entities = listEntities(universe);
    this.logger.info(
      { entities: entities.length, provider: this.images.name, concurrency: this.options.concurrency },
      'Generating reference images',
    );

    const taken = new Set<string>();
    const tasks = entities.map((typed) => {
      const stem = claimStem(canonicalImageStem(typed), taken);
      return {
        key: `${typed.type}:${typed.entity.name}`,
        run: () => this.generateOne(typed, stem, outputDir),
      };
    });

    const outcomes = await runPool(tasks, this.options.concurrency, (outcome) => {
      if (outcome.ok) this.logger.info({ element: outcome.key }, 'Reference image saved');
      else this.logger.error({ element: outcome.key, err: outcome.error.message }, 'Reference image failed');
    });

    const elements: ManifestElement[] = [];
    const failed: StageReport['failures'] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) elements.push(outcome.value);
      else failed.push({ key: outcome.key, error: outcome.error.message });
    }
    elements.sort(byTypeThenName);
    failed.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

    const manifest: ImageManifest = {
      script_id: scriptId,
      generated_at: new Date().toISOString(),
      elements,
    };
    const manifestPath = await writeJsonArtifact(join(outputDir, IMAGE_MANIFEST_FILE), manifest);

    const report: StageReport = {
      stage: REFERENCES_STAGE,
      expected: entities.length,
      produced: elements.length,
      failures: failed,
    };
    await writeStageReport(outputDir, report);

    this.logger.info({ produced: report.produced, expected: report.expected }, 'Reference images complete');
    return { manifest, manifestPath, report };
  }

  private async generateOne(typed: TypedEntity, stem: string, outputDir: string): Promise<ManifestElement> {
    const { type, entity } = typed;
    if (!entity.image_generation_prompt.trim()) {
      throw new MediaGenerationError(`${entity.name} has no image_generation_prompt`);
    }

    const media = await this.images.generate({
      prompt: entity.image_generation_prompt,
      referenceImages: [],
      resolution: this.options.resolution,
      aspectRatio: '16:9',
    });
    const saved = await persistMediaAs(media, join(outputDir, stem), '.png');

    return {
      element_name: entity.name,
      element_type: type,
      filepath: relative(outputDir, saved.path),
      ...(saved.url ? { url: saved.url } : {}),
    };
  }
}
