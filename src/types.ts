/**
 * Core types for ocs-link-mcp
 */

// ============================================
// OCS LINKS
// ============================================

/** `ocs` is the plain scheme, `ocss` its secure counterpart. */
export type OcsScheme = 'ocs' | 'ocss';

/** What the link asks the client to do. Carried as the URI host. */
export type OcsCommand = 'download' | 'install';

export interface ParsedLink {
  /** The input exactly as it was handed to the parser. */
  readonly rawUri: string;
  readonly scheme: OcsScheme;
  readonly command: OcsCommand;
  /** Serialized form of the absolute URI taken from the `url` parameter. */
  readonly downloadUrl: string;
  /** Value of the `type` parameter, not checked against the registry. */
  readonly installType: string;
  /** Present only when a `filename` key was supplied, even if empty. */
  readonly filename?: string;
}

export interface LinkFields {
  scheme: string;
  command: string;
  downloadUrl: string;
  installType: string;
  filename?: string;
}

/** Fields written into the query of a canonical link. */
export type LinkValueField = 'downloadUrl' | 'installType' | 'filename';

// ============================================
// ERRORS
// ============================================

export type UriSyntaxReason = 'relative-url-without-base' | 'empty-host' | 'invalid-url';

export interface UriSyntaxError {
  code: 'URI_SYNTAX_ERROR';
  reason: UriSyntaxReason;
  /** The text that failed to parse. */
  input: string;
  /** Message reported by the URL parser. */
  detail: string;
}

export type LinkError =
  | { code: 'DECODE_ERROR'; input: string }
  | UriSyntaxError
  | { code: 'MISSING_SCHEME' }
  | { code: 'UNRECOGNIZED_SCHEME'; text: string }
  | { code: 'MISSING_COMMAND' }
  | { code: 'UNRECOGNIZED_COMMAND'; text: string }
  | { code: 'MISSING_DOWNLOAD_URL' }
  | { code: 'MISSING_INSTALL_TYPE' }
  | { code: 'UNKNOWN_INSTALL_TYPE'; text: string }
  | { code: 'UNREPRESENTABLE_FIELD'; field: LinkValueField; text: string };

export type ParseResult =
  | { success: true; link: ParsedLink }
  | { success: false; error: LinkError };

// ============================================
// INSTALL TYPES
// ============================================

export type InstallFamily =
  | 'personal_media'
  | 'styling'
  | 'wm_themes'
  | 'desktop_assets'
  | 'app_specific';

export interface RegistryError {
  code: 'NO_MATCHING_INSTALL_TYPE';
  token: string;
  /** Family that was probed; absent when every family was. */
  family?: InstallFamily;
}

export type RegistryResult<T> =
  | { success: true; value: T }
  | { success: false; error: RegistryError };

// ============================================
// CONFIGURATION
// ============================================

export interface Config {
  checkInstallTypes: boolean;
  installTypePriority: string[];
  pageSize: number;
  logToolCalls: boolean;
}
