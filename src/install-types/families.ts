/**
 * Install-type families
 *
 * Each family is a closed set of variants. A variant maps to one install-path
 * template whose placeholders ($HOME, $XDG_DATA_HOME, $APP_DATA, $KDEHOME) are
 * expanded by whatever installs the file. Tokens are the strings that appear in
 * a link's `type` parameter, aliases included.
 *
 * Personal media tokens match case-insensitively; every other family matches
 * exactly.
 */

import type { InstallFamily } from '../types.js';

export interface InstallTypeFamily<V extends string> {
  readonly id: InstallFamily;
  readonly caseSensitive: boolean;
  readonly paths: Readonly<Record<V, string>>;
  readonly tokens: ReadonlyMap<string, V>;
}

function defineFamily<V extends string>(
  id: InstallFamily,
  caseSensitive: boolean,
  paths: Record<V, string>,
  tokens: Record<string, V>
): InstallTypeFamily<V> {
  return Object.freeze({
    id,
    caseSensitive,
    paths: Object.freeze(paths),
    tokens: new Map(Object.entries(tokens)),
  });
}

// ============================================
// PERSONAL MEDIA
// ============================================

const PERSONAL_MEDIA_PATHS = {
  Bin: '$HOME/.local/bin',
  Books: '$APP_DATA/books',
  Comics: '$APP_DATA/comics',
  Documents: '$HOME/Documents',
  Downloads: '$HOME/Downloads',
  Music: '$HOME/Music',
  Pictures: '$HOME/Pictures',
  Videos: '$HOME/Videos',
  Wallpapers: '$XDG_DATA_HOME/wallpapers',
} as const;

export type PersonalMedia = keyof typeof PERSONAL_MEDIA_PATHS;

export const PersonalMedia = defineFamily('personal_media', false, PERSONAL_MEDIA_PATHS, {
  bin: 'Bin',
  books: 'Books',
  comics: 'Comics',
  documents: 'Documents',
  downloads: 'Downloads',
  music: 'Music',
  pictures: 'Pictures',
  videos: 'Videos',
  wallpapers: 'Wallpapers',
});

// ============================================
// STYLING
// ============================================

const STYLING_PATHS = {
  ColorSchemes: '$XDG_DATA_HOME/color-schemes',
  Cursors: '$HOME/.icons',
  Emoticons: '$XDG_DATA_HOME/emoticons',
  Fonts: '$HOME/.fonts',
  Icons: '$XDG_DATA_HOME/icons',
  Themes: '$HOME/.themes',
} as const;

export type Styling = keyof typeof STYLING_PATHS;

export const Styling = defineFamily('styling', true, STYLING_PATHS, {
  color_schemes: 'ColorSchemes',
  cursors: 'Cursors',
  emoticons: 'Emoticons',
  fonts: 'Fonts',
  icons: 'Icons',
  themes: 'Themes',
  // Toolkit and window-manager themes all land in the same directory
  gtk_themes: 'Themes',
  gtk2_themes: 'Themes',
  gtk3_themes: 'Themes',
  gnome_shell_themes: 'Themes',
  cinnamon_themes: 'Themes',
  metacity_themes: 'Themes',
  xfwm4_themes: 'Themes',
  openbox_themes: 'Themes',
});

// ============================================
// WINDOW MANAGER THEMES
// ============================================

const WM_THEMES_PATHS = {
  CairoClockThemes: '$HOME/.cairo-clock/themes',
  CinnamonApplets: '$XDG_DATA_HOME/cinnamon/applets',
  CinnamonDesklets: '$XDG_DATA_HOME/cinnamon/desklets',
  CinnamonExtensions: '$XDG_DATA_HOME/cinnamon/extensions',
  EmeraldThemes: '$HOME/.emerald/themes',
  EnlightenmentBackgrounds: '$HOME/.e/e/backgrounds',
  EnlightenmentThemes: '$HOME/.e/e/themes',
  FluxboxStyles: '$HOME/.fluxbox/styles',
  GnomeShellExtensions: '$XDG_DATA_HOME/gnome-shell/extensions',
  IceWmThemes: '$HOME/.icewm/themes',
  PekWmThemes: '$HOME/.pekwm/themes',
} as const;

export type WmThemes = keyof typeof WM_THEMES_PATHS;

export const WmThemes = defineFamily('wm_themes', true, WM_THEMES_PATHS, {
  cairo_clock_themes: 'CairoClockThemes',
  cinnamon_applets: 'CinnamonApplets',
  cinnamon_desklets: 'CinnamonDesklets',
  cinnamon_extensions: 'CinnamonExtensions',
  emerald_themes: 'EmeraldThemes',
  enlightenment_backgrounds: 'EnlightenmentBackgrounds',
  enlightenment_themes: 'EnlightenmentThemes',
  fluxbox_styles: 'FluxboxStyles',
  gnome_shell_extensions: 'GnomeShellExtensions',
  icewm_themes: 'IceWmThemes',
  pekwm_themes: 'PekWmThemes',
});

// ============================================
// DESKTOP ENVIRONMENT ASSETS (KDE / Qt)
// ============================================

const DESKTOP_ASSETS_PATHS = {
  AmarokScripts: '$KDEHOME/share/apps/amarok/scripts',
  AuroraeThemes: '$XDG_DATA_HOME/aurorae/themes',
  DekoratorThemes: '$XDG_DATA_HOME/deKorator/themes',
  KwinEffects: '$XDG_DATA_HOME/kwin/effects',
  KwinScripts: '$XDG_DATA_HOME/kwin/scripts',
  KwinTabbox: '$XDG_DATA_HOME/kwin/tabbox',
  PlasmaDesktopThemes: '$XDG_DATA_HOME/plasma/desktoptheme',
  PlasmaLookAndFeel: '$XDG_DATA_HOME/plasma/look-and-feel',
  PlasmaPlasmoids: '$XDG_DATA_HOME/plasma/plasmoids',
  QtCurve: '$XDG_DATA_HOME/QtCurve',
  YakuakeSkins: '$KDEHOME/share/apps/yakuake/skins',
} as const;

export type DesktopAssets = keyof typeof DESKTOP_ASSETS_PATHS;

export const DesktopAssets = defineFamily('desktop_assets', true, DESKTOP_ASSETS_PATHS, {
  amarok_scripts: 'AmarokScripts',
  aurorae_themes: 'AuroraeThemes',
  dekorator_themes: 'DekoratorThemes',
  kwin_effects: 'KwinEffects',
  kwin_scripts: 'KwinScripts',
  kwin_tabbox: 'KwinTabbox',
  plasma_desktopthemes: 'PlasmaDesktopThemes',
  plasma4_desktopthemes: 'PlasmaDesktopThemes',
  plasma5_desktopthemes: 'PlasmaDesktopThemes',
  plasma_look_and_feel: 'PlasmaLookAndFeel',
  plasma5_look_and_feel: 'PlasmaLookAndFeel',
  plasma_plasmoids: 'PlasmaPlasmoids',
  plasma4_plasmoids: 'PlasmaPlasmoids',
  plasma5_plasmoids: 'PlasmaPlasmoids',
  qtcurve: 'QtCurve',
  yakuake_skins: 'YakuakeSkins',
});

// ============================================
// APPLICATION SPECIFIC
// ============================================

const APP_SPECIFIC_PATHS = {
  NautilusScripts: '$XDG_DATA_HOME/nautilus/scripts',
} as const;

export type AppSpecific = keyof typeof APP_SPECIFIC_PATHS;

export const AppSpecific = defineFamily('app_specific', true, APP_SPECIFIC_PATHS, {
  nautilus_scripts: 'NautilusScripts',
});

// ============================================
// CATEGORIES
// ============================================

export interface FamilyVariants {
  personal_media: PersonalMedia;
  styling: Styling;
  wm_themes: WmThemes;
  desktop_assets: DesktopAssets;
  app_specific: AppSpecific;
}

/** A resolved install type: which family, and which variant inside it. */
export type InstallCategory = {
  [K in InstallFamily]: { family: K; variant: FamilyVariants[K] };
}[InstallFamily];

export const FAMILIES: Readonly<Record<InstallFamily, InstallTypeFamily<string>>> = Object.freeze({
  personal_media: PersonalMedia,
  styling: Styling,
  wm_themes: WmThemes,
  desktop_assets: DesktopAssets,
  app_specific: AppSpecific,
});

/** Probe order used when the family of a token is not known. */
export const DEFAULT_FAMILY_ORDER: readonly InstallFamily[] = [
  'personal_media',
  'styling',
  'wm_themes',
  'desktop_assets',
  'app_specific',
];
