import { ValidationError } from '../errors/app-error.js';

const IMAGE_URL_PATTERN =
  /(?:https?:\/\/)?([\da-zA-Z\-.]+\.sinaimg\.cn)\/.+\/([\da-zA-Z]+\.(?:jpg|png|gif))/;

/** Size/quality path segments, best first. */
export const QUALITY_TIERS = [
  'mw2000',
  'woriginal',
  'large',
  'orj1080',
  'mw1024',
  'orj960',
  'sti960',
  'wapb720',
  'mw690',
  'orj480',
  'bmiddle',
  'wap360',
  'thumbnail',
  'thumb180',
  'wap180',
  'small',
  'square',
] as const;

const HOST_PREFIXES = ['wx', 'ww', 'tva', 'tvax'] as const;
const HOST_SHARDS = [1, 2, 3, 4] as const;

/**
 * Same image at every quality tier, in tier order.
 */
export function generateQualityVariants(url: string): string[] {
  const match = IMAGE_URL_PATTERN.exec(url);
  const host = match?.[1];
  const name = match?.[2];
  if (!host || !name) {
    throw new ValidationError('Not a sinaimg.cn image URL', { url });
  }

  return QUALITY_TIERS.map((quality) => `https://${host}/${quality}/${name}`);
}

/**
 * Image hostnames whose edges are worth caching.
 */
export function imageHostnames(): string[] {
  return HOST_PREFIXES.flatMap((prefix) =>
    HOST_SHARDS.map((shard) => `${prefix}${shard}.sinaimg.cn`)
  );
}
