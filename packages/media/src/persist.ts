import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, extname } from 'path';
import { MediaGenerationError } from '@adreel/shared';
import type { GeneratedMedia } from './types.js';

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
  '.mp4': 'video/mp4',
};

export function mimeTypeFor(path: string): string {
  return MIME_TYPES[extname(path).toLowerCase()] ?? 'application/octet-stream';
}

/** ".jpg" for "image/jpeg; charset=binary"; undefined for types we don't save. */
export function extensionFor(mimeType: string | null | undefined): string | undefined {
  if (!mimeType) return undefined;
  const type = mimeType.split(';')[0].trim().toLowerCase();
  return Object.keys(MIME_TYPES).find((ext) => MIME_TYPES[ext] === type);
}

export function isRemote(pathOrUrl: string): boolean {
  return /^https?:\/\//i.test(pathOrUrl);
}

/** Bytes of a local file or a remote image, with its MIME type. */
export async function readMediaInput(pathOrUrl: string): Promise<{ data: Buffer; mimeType: string }> {
  if (!isRemote(pathOrUrl)) {
    return { data: await readFile(pathOrUrl), mimeType: mimeTypeFor(pathOrUrl) };
  }

  const res = await fetch(pathOrUrl);
  if (!res.ok) {
    throw new MediaGenerationError(`Failed to fetch ${pathOrUrl}: HTTP ${res.status}`);
  }
  const mimeType = res.headers.get('content-type') ?? mimeTypeFor(new URL(pathOrUrl).pathname);
  return { data: Buffer.from(await res.arrayBuffer()), mimeType };
}

/** URLs pass through; local files become base64 data URIs. */
export async function toUploadable(pathOrUrl: string): Promise<string> {
  if (isRemote(pathOrUrl)) return pathOrUrl;
  const { data, mimeType } = await readMediaInput(pathOrUrl);
  return `data:${mimeType};base64,${data.toString('base64')}`;
}

export interface PersistedMedia {
  path: string;
  /** Source URL, kept so later calls can reference the file remotely. */
  url?: string;
}

type UrlMedia = Extract<GeneratedMedia, { kind: 'url' }>;

async function download(media: UrlMedia): Promise<Response> {
  const res = await fetch(media.url, media.headers ? { headers: media.headers } : undefined);
  if (!res.ok) {
    throw new MediaGenerationError(`Download failed (HTTP ${res.status}): ${media.url}`);
  }
  return res;
}

function saved(media: GeneratedMedia, path: string): PersistedMedia {
  return media.kind === 'url' && isRemote(media.url) ? { path, url: media.url } : { path };
}

export async function persistMedia(media: GeneratedMedia, path: string): Promise<PersistedMedia> {
  await mkdir(dirname(path), { recursive: true });
  const data = media.kind === 'bytes' ? media.data : Buffer.from(await (await download(media)).arrayBuffer());
  await writeFile(path, data);
  return saved(media, path);
}

/**
 * Saves at `stem` plus the extension of the media's content type: the MIME
 * type of inline bytes, else the download's Content-Type, else the URL's own
 * extension, else `fallbackExt`.
 */
export async function persistMediaAs(
  media: GeneratedMedia,
  stem: string,
  fallbackExt: string,
): Promise<PersistedMedia> {
  let data: Buffer;
  let ext: string | undefined;
  if (media.kind === 'bytes') {
    data = media.data;
    ext = extensionFor(media.mimeType);
  } else {
    const res = await download(media);
    data = Buffer.from(await res.arrayBuffer());
    ext =
      extensionFor(res.headers.get('content-type')) ??
      (isRemote(media.url) ? knownExtension(new URL(media.url).pathname) : undefined);
  }

  const path = `${stem}${ext ?? fallbackExt}`;
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
  return saved(media, path);
}

function knownExtension(path: string): string | undefined {
  const ext = extname(path).toLowerCase();
  return ext in MIME_TYPES ? (ext === '.jpeg' ? '.jpg' : ext) : undefined;
}
