import { existsSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import {
  ELEMENT_TYPES,
  MAX_REFERENCE_IMAGES,
  listEntities,
  type ElementType,
  type Entity,
  type ImageManifest,
  type Logger,
  type ManifestElement,
  type Scene,
  type TypedEntity,
  type UniverseRecord,
} from '@adreel/shared';
import { findBestMatch, splitVersionSuffix, type MatchTier } from './matcher.js';

export interface ResolvedReference {
  /** The name as the scene wrote it. */
  query: string;
  type: ElementType;
  entity: Entity;
  manifestName: string;
  /** Absolute path of the canonical image. */
  filepath: string;
  url?: string;
  tier: MatchTier;
}

export interface SceneReferences {
  sceneNumber: number;
  references: ResolvedReference[];
  dropped: ResolvedReference[];
  unresolved: string[];
}

export interface ReferenceResolverOptions {
  maxReferences?: number;
  /** Drop references to entities whose scenes_used lacks the scene. */
  requireSceneMembership?: boolean;
  fileExists?: (path: string) => boolean;
}

/**
 * Keep at most `limit` references, characters first, then props, then
 * locations. Order within a class is preserved.
 */
export function selectReferences<T extends { type: ElementType }>(
  refs: readonly T[],
  limit: number,
): { selected: T[]; dropped: T[] } {
  const cap = Math.max(0, Math.min(limit, MAX_REFERENCE_IMAGES));
  const ordered = ELEMENT_TYPES.flatMap((type) => refs.filter((ref) => ref.type === type));
  return { selected: ordered.slice(0, cap), dropped: ordered.slice(cap) };
}

/** Maps the element names a scene mentions to canonical reference images. */
export class ReferenceResolver {
  private entities: TypedEntity[];
  private manifestByType = new Map<ElementType, ManifestElement[]>();
  private maxReferences: number;
  private requireSceneMembership: boolean;
  private fileExists: (path: string) => boolean;

  constructor(
    universe: UniverseRecord,
    manifest: ImageManifest,
    private manifestDir: string,
    private logger: Logger,
    options: ReferenceResolverOptions = {},
  ) {
    this.entities = listEntities(universe);
    for (const element of manifest.elements) {
      const list = this.manifestByType.get(element.element_type) ?? [];
      list.push(element);
      this.manifestByType.set(element.element_type, list);
    }
    this.maxReferences = options.maxReferences ?? MAX_REFERENCE_IMAGES;
    this.requireSceneMembership = options.requireSceneMembership ?? true;
    this.fileExists = options.fileExists ?? existsSync;
  }

  resolveElement(rawName: string, sceneNumber?: number): ResolvedReference | null {
    const { base, version } = splitVersionSuffix(rawName);
    // Words in a version suffix must not win a word-overlap match, so the full
    // string only counts at the stricter tiers before the base name is tried.
    const attempts = version
      ? [
          { query: rawName, allowOverlap: false },
          { query: base, allowOverlap: true },
        ]
      : [{ query: rawName, allowOverlap: true }];
    const inScene = this.entitiesInScene(sceneNumber);

    for (const { query, allowOverlap } of attempts) {
      const match = findBestMatch(query, inScene, (e) => e.entity.name);
      if (!match || (!allowOverlap && match.tier === 'overlap')) continue;
      return this.toReference(rawName, query, match.candidate, match.tier);
    }

    const elsewhere = inScene.length < this.entities.length
      ? findBestMatch(version ? base : rawName, this.entities, (e) => e.entity.name)
      : null;
    if (elsewhere) {
      this.logger.debug(
        { element: rawName, entity: elsewhere.name, scene: sceneNumber, scenesUsed: elsewhere.candidate.entity.scenes_used },
        'Entity not used in this scene, dropping reference',
      );
    } else {
      this.logger.debug({ element: rawName, scene: sceneNumber }, 'No entity matches element name');
    }
    return null;
  }

  private entitiesInScene(sceneNumber: number | undefined): TypedEntity[] {
    if (sceneNumber === undefined || !this.requireSceneMembership) return this.entities;
    return this.entities.filter((e) => e.entity.scenes_used.includes(sceneNumber));
  }

  private toReference(
    rawName: string,
    query: string,
    { type, entity }: TypedEntity,
    tier: MatchTier,
  ): ResolvedReference | null {
    const candidates = this.manifestByType.get(type) ?? [];
    const image =
      findBestMatch(entity.name, candidates, (e) => e.element_name) ??
      findBestMatch(query, candidates, (e) => e.element_name);
    if (!image) {
      this.logger.debug({ element: rawName, entity: entity.name, type }, 'No reference image for entity');
      return null;
    }

    const filepath = isAbsolute(image.candidate.filepath)
      ? image.candidate.filepath
      : resolve(this.manifestDir, image.candidate.filepath);
    if (!this.fileExists(filepath)) {
      this.logger.debug({ element: rawName, filepath }, 'Reference image missing on disk');
      return null;
    }

    return {
      query: rawName,
      type,
      entity,
      manifestName: image.name,
      filepath,
      ...(image.candidate.url ? { url: image.candidate.url } : {}),
      tier,
    };
  }

  resolveScene(scene: Scene): SceneReferences {
    const resolved: ResolvedReference[] = [];
    const unresolved: string[] = [];
    const seen = new Set<string>();

    for (const name of scene.elements_used) {
      const ref = this.resolveElement(name, scene.scene_number);
      if (!ref) {
        unresolved.push(name);
        continue;
      }
      if (seen.has(ref.filepath)) continue;
      seen.add(ref.filepath);
      resolved.push(ref);
    }

    const { selected, dropped } = selectReferences(resolved, this.maxReferences);
    if (dropped.length > 0) {
      this.logger.warn(
        {
          scene: scene.scene_number,
          available: resolved.length,
          limit: selected.length,
          dropped: dropped.map((ref) => `${ref.manifestName} [${ref.type}]`),
        },
        'Too many reference images, dropping lower-priority elements',
      );
    }
    if (unresolved.length > 0) {
      this.logger.info({ scene: scene.scene_number, unresolved }, 'Some elements have no reference image');
    }

    return { sceneNumber: scene.scene_number, references: selected, dropped, unresolved };
  }
}
