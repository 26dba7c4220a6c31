import type { LinkError, LinkValueField, RegistryError, UriSyntaxError } from '../types.js';

const FIELD_LABELS: Record<LinkValueField, string> = {
  downloadUrl: 'download URL',
  installType: 'install type',
  filename: 'filename',
};

/**
 * One-line, user-facing description of a link error
 */
export function describeLinkError(error: LinkError): string {
  switch (error.code) {
    case 'DECODE_ERROR':
      return `The link contains a malformed percent-escape: \`${error.input}\``;
    case 'URI_SYNTAX_ERROR':
      return describeSyntaxError(error);
    case 'MISSING_SCHEME':
      return 'No OCS scheme was provided. Try a link like `ocs://...`';
    case 'UNRECOGNIZED_SCHEME':
      return `An unexpected OCS scheme was provided: \`${error.text}\`. Use \`ocs://\` or \`ocss://\`.`;
    case 'MISSING_COMMAND':
      return 'No OCS command was provided. Try a link like `ocs://install?...`';
    case 'UNRECOGNIZED_COMMAND':
      return `An unexpected OCS command was provided: \`${error.text}\`. Ask for either \`install\` or \`download\`.`;
    case 'MISSING_DOWNLOAD_URL':
      return 'The link has no `url` parameter to download from.';
    case 'MISSING_INSTALL_TYPE':
      return 'The link has no `type` parameter.';
    case 'UNKNOWN_INSTALL_TYPE':
      return `An unknown install type was given: \`${error.text}\``;
    case 'UNREPRESENTABLE_FIELD':
      return `The ${FIELD_LABELS[error.field]} cannot be written into a link unchanged: \`${error.text}\``;
  }
}

function describeSyntaxError(error: UriSyntaxError): string {
  switch (error.reason) {
    case 'relative-url-without-base':
      return `Not an absolute URI (no scheme): \`${error.input}\``;
    case 'empty-host':
      return `The URI has an empty host: \`${error.input}\``;
    case 'invalid-url':
      return `Malformed URI (${error.detail}): \`${error.input}\``;
  }
}

export function describeRegistryError(error: RegistryError): string {
  const scope = error.family ? ` in ${error.family}` : '';
  return `No known install type matched \`${error.token}\`${scope}`;
}
