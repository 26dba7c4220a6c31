/**
 * OCS link parser
 *
 * Turns a raw `ocs://` / `ocss://` link into a validated ParsedLink, or
 * reports the first thing wrong with it. Steps run in a fixed order and the
 * first failure wins:
 *
 *   decode -> absolute URI -> scheme -> command -> url -> type -> filename
 */

import type {
  LinkError,
  LinkFields,
  LinkValueField,
  OcsCommand,
  OcsScheme,
  ParsedLink,
  ParseResult,
} from '../types.js';
import {
  decodePreservingDelimiters,
  getSchemeAsWritten,
  hasAuthority,
  parseAbsoluteUrl,
  queryToMap,
} from '../utils/url.js';
import { isSameLink, renderOcsLink, type RenderableLink } from './serializer.js';

const SCHEMES: ReadonlyMap<string, OcsScheme> = new Map([
  ['ocs', 'ocs'],
  ['ocss', 'ocss'],
]);

const COMMANDS: ReadonlyMap<string, OcsCommand> = new Map([
  ['download', 'download'],
  ['install', 'install'],
]);

function fail(error: LinkError): ParseResult {
  return { success: false, error };
}

function freezeLink(link: ParsedLink): ParsedLink {
  return Object.freeze(link);
}

/**
 * Parse a raw OCS link
 */
export function parseOcsLink(raw: string): ParseResult {
  const decoded = decodePreservingDelimiters(raw);
  if (decoded === null) {
    return fail({ code: 'DECODE_ERROR', input: raw });
  }

  const parsed = parseAbsoluteUrl(decoded);
  if (!parsed.success) {
    return fail(parsed.error);
  }
  const uri = parsed.url;

  if (hasAuthority(uri) && uri.hostname === '') {
    return fail({
      code: 'URI_SYNTAX_ERROR',
      reason: 'empty-host',
      input: decoded,
      detail: 'Empty host',
    });
  }

  const schemeText = getSchemeAsWritten(decoded, uri);
  const scheme = SCHEMES.get(schemeText.toLowerCase());
  if (!scheme) {
    return fail({ code: 'UNRECOGNIZED_SCHEME', text: schemeText });
  }

  if (!hasAuthority(uri)) {
    return fail({ code: 'MISSING_COMMAND' });
  }
  const commandText = uri.hostname;
  const command = COMMANDS.get(commandText.toLowerCase());
  if (!command) {
    return fail({ code: 'UNRECOGNIZED_COMMAND', text: commandText });
  }

  const params = queryToMap(uri);

  const urlValue = params.get('url');
  if (urlValue === undefined) {
    return fail({ code: 'MISSING_DOWNLOAD_URL' });
  }
  const downloadUrl = parseAbsoluteUrl(urlValue);
  if (!downloadUrl.success) {
    return fail(downloadUrl.error);
  }

  const installType = params.get('type');
  if (installType === undefined) {
    return fail({ code: 'MISSING_INSTALL_TYPE' });
  }

  // installType is kept verbatim; checkInstallType resolves it separately.
  const filename = params.get('filename');

  return {
    success: true,
    link: freezeLink({
      rawUri: raw,
      scheme,
      command,
      downloadUrl: downloadUrl.url.href,
      installType,
      ...(filename !== undefined ? { filename } : {}),
    }),
  };
}

function roundTrips(link: RenderableLink): boolean {
  const reparsed = parseOcsLink(renderOcsLink(link));
  return reparsed.success && isSameLink(link, reparsed.link);
}

/**
 * The field that keeps a link from parsing back to itself, if any
 */
function unrepresentableField(link: RenderableLink): LinkValueField | undefined {
  if (roundTrips(link)) {
    return undefined;
  }
  const { filename, ...required } = link;
  if (filename !== undefined && roundTrips(required)) {
    return 'filename';
  }
  return roundTrips({ ...required, installType: '' }) ? 'installType' : 'downloadUrl';
}

/**
 * Build a link from already-separated fields, applying the same checks the
 * parser applies to a raw link. The resulting rawUri is the canonical form,
 * and it must parse back to the same fields.
 */
export function createOcsLink(fields: LinkFields): ParseResult {
  const scheme = SCHEMES.get(fields.scheme.toLowerCase());
  if (!scheme) {
    return fail({ code: 'UNRECOGNIZED_SCHEME', text: fields.scheme });
  }

  if (fields.command === '') {
    return fail({ code: 'MISSING_COMMAND' });
  }
  const command = COMMANDS.get(fields.command.toLowerCase());
  if (!command) {
    return fail({ code: 'UNRECOGNIZED_COMMAND', text: fields.command });
  }

  const downloadUrl = parseAbsoluteUrl(fields.downloadUrl);
  if (!downloadUrl.success) {
    return fail(downloadUrl.error);
  }

  const link: RenderableLink = {
    scheme,
    command,
    downloadUrl: downloadUrl.url.href,
    installType: fields.installType,
    ...(fields.filename !== undefined ? { filename: fields.filename } : {}),
  };

  const field = unrepresentableField(link);
  if (field) {
    return fail({ code: 'UNREPRESENTABLE_FIELD', field, text: link[field] ?? '' });
  }

  return {
    success: true,
    link: freezeLink({ rawUri: renderOcsLink(link), ...link }),
  };
}
