import { NotFoundError } from '../errors.js';

/** Decoded last path segment. A malformed percent-encoding names no resource. */
export function pathParam(req: Request): string {
  const parts = new URL(req.url).pathname.split('/').filter(Boolean);
  const raw = parts[parts.length - 1] ?? '';
  try {
    return decodeURIComponent(raw);
  } catch (err) {
    if (err instanceof URIError) throw new NotFoundError(`Malformed path segment "${raw}"`);
    throw err;
  }
}
