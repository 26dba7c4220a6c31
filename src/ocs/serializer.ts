/**
 * Canonical rendering of OCS links
 */

import type { ParsedLink } from '../types.js';
import { percentEncode } from '../utils/url.js';

export type RenderableLink = Omit<ParsedLink, 'rawUri'>;

/**
 * Render a link in canonical form:
 *
 *   {scheme}://{command}?url={encoded url}&type={type}[&filename={filename}]
 *
 * The download URL is percent-encoded; type and filename are written as-is.
 * A parsed link is decoded twice (whole link, then query value), so a literal
 * `%` in the download URL is escaped twice.
 */
export function renderOcsLink(link: RenderableLink): string {
  const base = `${link.scheme}://${link.command}?url=${encodeDownloadUrl(link.downloadUrl)}&type=${link.installType}`;
  return link.filename !== undefined ? `${base}&filename=${link.filename}` : base;
}

function encodeDownloadUrl(url: string): string {
  return percentEncode(url).replace(/%25/g, '%2525');
}

/**
 * Compare the modeled fields of two links, ignoring rawUri
 */
export function isSameLink(a: RenderableLink, b: RenderableLink): boolean {
  return a.scheme === b.scheme &&
    a.command === b.command &&
    a.downloadUrl === b.downloadUrl &&
    a.installType === b.installType &&
    a.filename === b.filename;
}
